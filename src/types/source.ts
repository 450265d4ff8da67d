/**
 * Source Model Types
 * @module types/source
 *
 * Read-only view of the externally owned dataset the core curates.
 */

/**
 * 2-D position of a recording channel
 */
export type ChannelPosition = readonly [number, number];

export interface SourceModel {
  /** Dataset name, used for the store directory and logs */
  readonly name: string;
  readonly nItems: number;
  readonly nChannels: number;
  readonly nFeaturesPerChannel: number;
  /** Group of every item when the dataset is opened */
  readonly initialAssignment: Int32Array;
  /** nItems × nChannels × nFeaturesPerChannel, row-major */
  readonly features: Float32Array;
  /** nItems × nChannels, row-major */
  readonly masks: Float32Array;
  /** One position per channel */
  readonly channelPositions: readonly ChannelPosition[];
}
