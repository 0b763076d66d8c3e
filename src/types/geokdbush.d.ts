declare module 'geokdbush' {
  import type KDBush from 'kdbush';

  /**
   * Indices of indexed points around a query point, nearest first.
   *
   * @param maxResults - defaults to Infinity
   * @param maxDistance - in kilometers, defaults to Infinity
   */
  export function around(
    index: KDBush,
    lon: number,
    lat: number,
    maxResults?: number,
    maxDistance?: number,
    filterFn?: (idx: number) => boolean
  ): number[];
}
