/**
 * Wall-clock timing for index build and search tests
 */

import { performance } from "node:perf_hooks";

export const clock = {
  /**
   * Run fn once and time it
   * @returns The result of fn and the elapsed milliseconds
   */
  measure<T>(fn: () => T): [T, number] {
    const start = performance.now();
    const result = fn();
    return [result, performance.now() - start];
  },
};
