/**
 * Shared test fixtures
 * @module tests/helpers/fixtures
 */

import { vi } from 'vitest';
import { createInMemorySource } from '../../src/session/source.js';
import type { SourceModel } from '../../src/types/source.js';

/**
 * Four items on two channels with one feature per channel.
 *
 * | item | group | masks      | features |
 * |------|-------|------------|----------|
 * | 0    | 0     | 1, 0       | 0, 1     |
 * | 1    | 0     | 0.5, 0     | 10, 11   |
 * | 2    | 1     | 0, 0.25    | 20, 21   |
 * | 3    | 1     | 0, 0.75    | 30, 31   |
 *
 * Channel 0 sits at (0, 0), channel 1 at (10, 20).
 */
export function createTestSource(name = 'test-dataset'): SourceModel {
  return createInMemorySource({
    name,
    nChannels: 2,
    nFeaturesPerChannel: 1,
    initialAssignment: Int32Array.from([0, 0, 1, 1]),
    features: Float32Array.from([0, 1, 10, 11, 20, 21, 30, 31]),
    masks: Float32Array.from([1, 0, 0.5, 0, 0, 0.25, 0, 0.75]),
    channelPositions: [
      [0, 0],
      [10, 20],
    ],
  });
}

/**
 * Logger whose methods are all spies
 */
export function createLoggerSpy() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
