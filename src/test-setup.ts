import { vi } from 'vitest'

vi.mock('@backend/utils/logger', () => ({
  logger: {
    setLevel: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    stage: vi.fn(),
  },
}))
