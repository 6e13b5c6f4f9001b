export * as scale from './scale.js';
export { CentroidBuffer, BYTES_PER_CENTROID } from './centroids.js';
export type { Centroid } from './centroids.js';
export { TDigest } from './tdigest.js';
export type { DigestJson } from './tdigest.js';
