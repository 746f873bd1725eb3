describe("pull CLI", () => {
  const envSnapshot = { ...process.env };

  afterEach(() => {
    process.env = { ...envSnapshot };
    process.exitCode = undefined;
    jest.resetModules();
    jest.restoreAllMocks();
  });

  it("reads debug mode from DEBUG", async () => {
    const { isDebugMode } = await import("../../src/cli/pull");

    expect(isDebugMode({ DEBUG: "TRUE" })).toBe(true);
    expect(isDebugMode({ DEBUG: "1" })).toBe(true);
    expect(isDebugMode({ DEBUG: "0" })).toBe(false);
    expect(isDebugMode({})).toBe(false);
  });

  it("logs a sanitized envelope and exits with code 1 on failure", async () => {
    process.env = { ...envSnapshot, DEBUG: "0" };

    const runPull = jest.fn().mockRejectedValue(Object.assign(new Error("Form census not found"), {
      name: "PullError",
      code: "form_not_found",
      context: { formId: "census" },
      cause: { huge: "do-not-print-this" }
    }));

    jest.doMock("../../src/composition/root", () => ({ runPull }));

    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const exitSpy = jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

    const { executePullCli } = await import("../../src/cli/pull");
    await expect(executePullCli()).rejects.toThrow("EXIT:1");

    expect(runPull).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);

    const logged = String(errorSpy.mock.calls[0]?.[0] ?? "");
    expect(JSON.parse(logged)).toEqual({
      event: "pull.failed",
      name: "PullError",
      message: "Form census not found",
      code: "form_not_found",
      context: { formId: "census" }
    });
    expect(logged).not.toContain("do-not-print-this");

    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("sets a failing exit code when some forms failed", async () => {
    const runPull = jest.fn().mockResolvedValue({ forms: 2, succeeded: 1, failed: 1 });
    jest.doMock("../../src/composition/root", () => ({ runPull }));

    const { executePullCli } = await import("../../src/cli/pull");
    await executePullCli();

    expect(process.exitCode).toBe(1);
  });

  it("cancels the running pull on SIGINT and removes its handler afterwards", async () => {
    const cancel = jest.fn();
    const listenersBefore = process.listenerCount("SIGINT");
    const runPull = jest.fn(async (opts: { onStart: (runner: { cancel: () => void }) => void }) => {
      opts.onStart({ cancel });
      process.emit("SIGINT");
      return { forms: 1, succeeded: 1, failed: 0 };
    });
    jest.doMock("../../src/composition/root", () => ({ runPull }));

    const { executePullCli } = await import("../../src/cli/pull");
    await executePullCli();

    expect(cancel).toHaveBeenCalledTimes(1);
    expect(process.exitCode).toBeUndefined();
    expect(process.listenerCount("SIGINT")).toBe(listenersBefore);
  });
});
