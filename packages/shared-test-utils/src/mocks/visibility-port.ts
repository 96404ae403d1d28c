import { vi, type Mock } from 'vitest';
import type { VisibilityPort } from '@devquery/core';

/**
 * In-memory stand-in for `process.env`, as seen by the genuine backend
 */
export interface MemoryEnvironment extends VisibilityPort {
  /** Current variable values */
  readonly vars: Map<string, string>;
  read: Mock<(variable: string) => string | undefined>;
  clear: Mock<(variable: string) => void>;
  restore: Mock<(variable: string, value: string) => void>;
  /** Set or unset a variable without recording a call */
  set: (variable: string, value: string | undefined) => void;
}

export function createMemoryEnvironment(initial: Record<string, string> = {}): MemoryEnvironment {
  const vars = new Map(Object.entries(initial));

  return {
    vars,
    read: vi.fn((variable: string) => vars.get(variable)),
    clear: vi.fn((variable: string) => {
      vars.delete(variable);
    }),
    restore: vi.fn((variable: string, value: string) => {
      vars.set(variable, value);
    }),
    set: (variable, value) => {
      if (value === undefined) {
        vars.delete(variable);
      } else {
        vars.set(variable, value);
      }
    },
  };
}
