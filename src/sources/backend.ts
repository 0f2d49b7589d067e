/**
 * Harvest source interface – an opaque fetch of raw vocabulary data.
 */

export interface HarvestedData {
  data: Uint8Array;
  /** Name to store the data under, e.g. "harvest.json". */
  filename: string;
}

export interface HarvestSource<S> {
  fetch(settings: S): Promise<HarvestedData>;
}
