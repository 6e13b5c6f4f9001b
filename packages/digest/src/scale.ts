/** Upper bound of the compression parameter */
export const MAX_COMPRESSION = 1e6;

export function boundedCompression(compression: number) {
  return Math.min(MAX_COMPRESSION, compression);
}

/** The maximum number of centroids a merged digest of the given compression retains */
export function maxCentroids(compression: number) {
  return 2 * Math.ceil(boundedCompression(compression));
}

/**
 * Arcsine scale function. Maps a quantile to the scale coordinate in
 * [0, compression]; the mapping is steepest near q = 0 and q = 1 so that
 * clusters near the tails are small.
 */
export function quantileToScale(compression: number, q: number) {
  return (compression * (Math.asin(2 * q - 1) + Math.PI / 2)) / Math.PI;
}

/** Inverse of quantileToScale. s is clamped to the compression */
export function scaleToQuantile(compression: number, s: number) {
  s = Math.min(s, compression);
  return (Math.sin((s * Math.PI) / compression - Math.PI / 2) + 1) / 2;
}
