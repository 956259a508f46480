import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { StateService } from "../../state/state.service";

describe("StateService.evictIdle", () => {
  it("drops sessions idle past the limit and keeps recent ones", () => {
    let now = new Date("2026-03-01T10:00:00.000Z");
    const ids = ["idle", "recent"];
    const service = new StateService(
      () => now,
      () => ids.shift() ?? "extra",
    );
    service.create();
    const recent = service.create();

    now = new Date("2026-03-01T10:50:00.000Z");
    recent.lastActivityAt = "2026-03-01T10:45:00.000Z";
    service.commit(recent);

    assert.deepEqual(service.evictIdle(30 * 60_000), ["idle"]);
    assert.equal(service.getSession("idle"), null);
    assert.equal(service.getSession("recent")?.sessionId, "recent");
  });

  it("keeps a session while a turn is in flight", async () => {
    let now = new Date("2026-03-01T10:00:00.000Z");
    const service = new StateService(
      () => now,
      () => "busy",
    );
    service.create();
    now = new Date("2026-03-01T12:00:00.000Z");

    let release: () => void = () => undefined;
    const pending = service.runExclusive(
      "busy",
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    );
    await new Promise<void>((resolve) => setImmediate(resolve));
    assert.deepEqual(service.evictIdle(60_000), []);

    release();
    await pending;
    await new Promise<void>((resolve) => setImmediate(resolve));
    assert.deepEqual(service.evictIdle(60_000), ["busy"]);
  });
});
