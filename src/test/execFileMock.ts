/**
 * Helpers for driving a mocked `child_process.execFile` through `promisify`.
 * The callback is always the last argument, whichever overload was used.
 */
export function resolveExecFile(mock: jest.Mock, stdout: string, stderr = ""): void {
  mock.mockImplementation((...args: unknown[]) => {
    const callback = args[args.length - 1];
    if (typeof callback === "function") {
      process.nextTick(() => callback(null, { stdout, stderr }));
    }
  });
}

export function rejectExecFile(mock: jest.Mock, error: Error): void {
  mock.mockImplementation((...args: unknown[]) => {
    const callback = args[args.length - 1];
    if (typeof callback === "function") {
      process.nextTick(() => callback(error));
    }
  });
}
