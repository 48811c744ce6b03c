import "../setup";
import { Mutex } from "../../src/utils/mutex";

describe("Mutex", () => {
  it("runs sections one at a time in call order", async () => {
    const mutex = new Mutex();
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((r) => {
      release = r;
    });

    const a = mutex.runExclusive(async () => {
      order.push("a:start");
      await gate;
      order.push("a:end");
      return 1;
    });
    const b = mutex.runExclusive(() => {
      order.push("b");
      return 2;
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(order).toEqual(["a:start"]);

    release();
    await expect(a).resolves.toBe(1);
    await expect(b).resolves.toBe(2);
    expect(order).toEqual(["a:start", "a:end", "b"]);
  });

  it("keeps going after a section throws", async () => {
    const mutex = new Mutex();
    const failed = mutex.runExclusive(() => {
      throw new Error("boom");
    });
    const next = mutex.runExclusive(() => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});
