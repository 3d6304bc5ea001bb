import { afterEach, vi } from "vitest";

// No test talks to a real model or database; fakes are injected per test.
afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});
