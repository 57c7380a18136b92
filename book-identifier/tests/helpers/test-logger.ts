import { vi } from "vitest";

import type { Logger } from "@/application/interfaces/logger";

export const createTestLogger = () =>
  ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }) satisfies Logger;
