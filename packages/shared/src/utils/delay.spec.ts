import { CuaError, CuaErrorCode } from "../errors/cua.errors";
import { abortable, delay, throwIfAborted } from "./delay";

describe("delay", () => {
  it("resolves after the timeout", async () => {
    const started = Date.now();
    await delay(20);
    expect(Date.now() - started).toBeGreaterThanOrEqual(15);
  });

  it("rejects with the abort reason when the signal fires", async () => {
    const controller = new AbortController();
    const reason = new CuaError(CuaErrorCode.Timeout);
    const pending = delay(10_000, controller.signal);
    controller.abort(reason);
    await expect(pending).rejects.toBe(reason);
  });

  it("rejects immediately on an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort("no error object");
    await expect(delay(10, controller.signal)).rejects.toMatchObject({
      code: CuaErrorCode.Canceled,
    });
  });

  it("maps the default AbortError to a cancellation", async () => {
    const controller = new AbortController();
    const pending = delay(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({
      code: CuaErrorCode.Canceled,
    });
  });

  it("throwIfAborted is silent without a signal", () => {
    expect(() => throwIfAborted(undefined)).not.toThrow();
  });
});

describe("abortable", () => {
  it("passes the value through", async () => {
    const controller = new AbortController();
    await expect(abortable(Promise.resolve(7), controller.signal)).resolves.toBe(7);
  });

  it("rejects when the signal aborts before the promise settles", async () => {
    const controller = new AbortController();
    const never = new Promise<number>(() => undefined);
    const pending = abortable(never, controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({
      code: CuaErrorCode.Canceled,
    });
  });

  it("keeps the original rejection", async () => {
    await expect(
      abortable(Promise.reject(new Error("boom")), new AbortController().signal),
    ).rejects.toThrow("boom");
  });
});
