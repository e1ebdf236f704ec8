/**
 * Sales source import types
 */

export type Delimiter = 'auto' | 'comma' | 'tab' | 'pipe';

export interface ParseOptions {
  delimiter?: Delimiter;
}
