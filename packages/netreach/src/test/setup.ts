/**
 * Test setup file for Vitest.
 */

import "@testing-library/jest-dom/vitest";
import { beforeEach, afterEach, vi } from "vitest";

// Clear all mocks between tests
beforeEach(() => {
  vi.clearAllMocks();
});

afterEach(() => {
  vi.restoreAllMocks();
});
