import { SchedulerEmitter } from "../../src/events/emitter";
import { ConsoleLogger } from "../../src/logging/logger";

describe("SchedulerEmitter", () => {
  test("delivers typed payloads", () => {
    const emitter = new SchedulerEmitter();
    const recovered: number[] = [];
    emitter.on("recovery:complete", ({ recovered: count }) => recovered.push(count));

    emitter.emitSafe("recovery:complete", { recovered: 2 });

    expect(recovered).toEqual([2]);
  });

  test("once and off detach listeners", () => {
    const emitter = new SchedulerEmitter();
    let onceCalls = 0;
    let calls = 0;
    const listener = () => calls++;

    emitter.once("scheduler:start", () => onceCalls++);
    emitter.on("scheduler:start", listener);
    emitter.emitSafe("scheduler:start", undefined);
    emitter.off("scheduler:start", listener);
    emitter.emitSafe("scheduler:start", undefined);

    expect(onceCalls).toBe(1);
    expect(calls).toBe(1);
    expect(emitter.listenerCount("scheduler:start")).toBe(0);
  });

  test("a throwing listener is reported as scheduler:error", () => {
    const emitter = new SchedulerEmitter();
    const errors: string[] = [];
    emitter.on("recovery:complete", () => {
      throw new Error("listener exploded");
    });
    emitter.on("scheduler:error", (err) => errors.push(err.message));

    expect(() => emitter.emitSafe("recovery:complete", { recovered: 0 })).not.toThrow();
    expect(errors).toEqual(["listener exploded"]);
  });

  test("without an error listener the failure is logged", () => {
    const lines: string[] = [];
    const emitter = new SchedulerEmitter(new ConsoleLogger("test", "info", (line) => lines.push(line)));
    emitter.on("scheduler:stop", () => {
      throw new TypeError("bad listener");
    });

    emitter.emitSafe("scheduler:stop", undefined);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("[ERROR] [test] Listener for scheduler:stop failed TypeError: bad listener");
  });

  test("a throwing error listener is logged too", () => {
    const lines: string[] = [];
    const emitter = new SchedulerEmitter(new ConsoleLogger("test", "info", (line) => lines.push(line)));
    emitter.on("scheduler:start", () => {
      throw new Error("first");
    });
    emitter.on("scheduler:error", () => {
      throw new Error("second");
    });

    expect(() => emitter.emitSafe("scheduler:start", undefined)).not.toThrow();
    expect(lines[0]).toContain("Listener for scheduler:start failed Error: second");
  });
});
