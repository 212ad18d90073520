export type SimpleCacheOptions = {
  readonly ttlSec: number;
  readonly maxKeys?: number;
  readonly checkperiod?: number;
};
