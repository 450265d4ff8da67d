/**
 * In-memory source model
 * @module session/source
 */

import { z } from 'zod';
import { CacheItemError } from '../errors/index.js';
import type { SourceModel } from '../types/source.js';

const InMemorySourceSchema = z
  .object({
    name: z.string().min(1),
    nChannels: z.number().int().nonnegative(),
    nFeaturesPerChannel: z.number().int().nonnegative(),
    initialAssignment: z.instanceof(Int32Array),
    features: z.instanceof(Float32Array),
    masks: z.instanceof(Float32Array),
    channelPositions: z.array(z.tuple([z.number(), z.number()])),
  })
  .superRefine((value, ctx) => {
    const nItems = value.initialAssignment.length;
    if (value.features.length !== nItems * value.nChannels * value.nFeaturesPerChannel) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['features'],
        message: `expected ${nItems * value.nChannels * value.nFeaturesPerChannel} values`,
      });
    }
    if (value.masks.length !== nItems * value.nChannels) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['masks'],
        message: `expected ${nItems * value.nChannels} values`,
      });
    }
    if (value.channelPositions.length !== value.nChannels) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['channelPositions'],
        message: `expected ${value.nChannels} positions`,
      });
    }
  });

export type InMemorySourceInit = z.input<typeof InMemorySourceSchema>;

/**
 * Build a source model from arrays already in memory.
 * `nItems` is taken from the initial assignment.
 * @throws CacheItemError when the arrays disagree with the dimensions
 */
export function createInMemorySource(init: InMemorySourceInit): SourceModel {
  const parsed = InMemorySourceSchema.safeParse(init);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new CacheItemError(`Invalid source model: ${issues.join('; ')}`, 'source', {
      details: { issues },
    });
  }

  const value = parsed.data;
  return Object.freeze({
    name: value.name,
    nItems: value.initialAssignment.length,
    nChannels: value.nChannels,
    nFeaturesPerChannel: value.nFeaturesPerChannel,
    initialAssignment: value.initialAssignment,
    features: value.features,
    masks: value.masks,
    channelPositions: value.channelPositions.map(([x, y]) => [x, y] as const),
  });
}
