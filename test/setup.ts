import { afterEach, vi } from "vitest";

// Quiet the logger unless a test run asks for more.
process.env.LOG_LEVEL ??= "error";

afterEach(() => {
  vi.useRealTimers();
  vi.unstubAllGlobals();
});
