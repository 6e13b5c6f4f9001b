import { pathToFileURL } from 'node:url';
import { debug } from 'node:util';
import { lilconfig } from 'lilconfig';
import { Status, assignDeep, isObject } from '@tally/base';
import { scale } from '@tally/digest';

const dbg = debug('tally:config');

export interface TallyConfig {
  digest: {
    /**
     * Bounds the number of centroids (2 * compression) of each digest, and
     * so the accuracy of its estimates.
     */
    compression: number;
  };

  report: {
    /** The quantiles to report when summarizing samples */
    quantiles: number[];

    /** Significant digits of reported values */
    precision: number;
  };
}

export const defaults: Readonly<TallyConfig> = Object.freeze({
  digest: {
    compression: 100,
  },
  report: {
    quantiles: [0, 0.25, 0.5, 0.75, 0.9, 0.99, 1],
    precision: 6,
  },
});

/** Import a module, or require it where the runtime cannot import, e.g. under a test VM */
async function importModule(filepath: string): Promise<unknown> {
  try {
    return await import(pathToFileURL(filepath).href);
  } catch (e) {
    dbg('Import failed, requiring (%s): %s', filepath, e);
    const exports: unknown = require(filepath);
    return { default: exports };
  }
}

const loadEsm = async (filepath: string): Promise<unknown> => {
  try {
    dbg(`Loading (${filepath})`);
    const exports = await importModule(filepath);

    if (isObject(exports) && isObject(exports.default)) {
      return exports.default;
    } else {
      dbg("Config file doesn't have a valid default export");
    }
  } catch (e) {
    dbg('Failed to load config file %s', e);
  }

  return {};
};

const explorer = lilconfig('tally', {
  searchPlaces: [
    'package.json',
    '.tallyrc.json',
    '.tallyrc.js',
    '.tallyrc.mjs',
    'tally.config.js',
    'tally.config.mjs',
  ],
  loaders: {
    '.js': loadEsm,
    '.mjs': loadEsm,
  },
});

/** Check the shape and ranges of a configuration */
export function validate(cfg: unknown): Status<TallyConfig> {
  if (!isObject(cfg) || !isObject(cfg.digest) || !isObject(cfg.report)) {
    return Status.err('Invalid configuration: expected "digest" and "report" sections');
  }

  const { compression } = cfg.digest;
  if (typeof compression !== 'number' || !(compression > 0 && compression <= scale.MAX_COMPRESSION)) {
    return Status.err(
      `Invalid configuration: digest.compression must be in (0, ${scale.MAX_COMPRESSION}], got ${String(compression)}`
    );
  }

  const { quantiles, precision } = cfg.report;
  if (!Array.isArray(quantiles) || !quantiles.every(isQuantile)) {
    return Status.err('Invalid configuration: report.quantiles must be a list of numbers in [0, 1]');
  }

  if (typeof precision !== 'number' || !Number.isInteger(precision) || precision < 1 || precision > 17) {
    return Status.err(
      `Invalid configuration: report.precision must be an integer in [1, 17], got ${String(precision)}`
    );
  }

  return Status.value({
    digest: { compression },
    report: { quantiles, precision },
  });
}

function isQuantile(q: unknown): q is number {
  return typeof q === 'number' && q >= 0 && q <= 1;
}

/** Map of rootDir to config */
const sessionConfigs = new Map<string, TallyConfig>();

/** Find and load the configuration which applies to the given directory */
export async function load(rootDir: string): Promise<Status<TallyConfig>> {
  const cached = sessionConfigs.get(rootDir);
  if (cached !== undefined) return Status.value(cached);

  let config: unknown = structuredClone(defaults);

  try {
    const sr = await explorer.search(rootDir);

    if (sr?.filepath && !sr.isEmpty) {
      dbg('Found %s', sr.filepath);
      config = assignDeep(structuredClone(defaults), sr.config);
    } else {
      dbg('Config file not found');
    }
  } catch (e) {
    return Status.err(e instanceof Error ? e : new Error(String(e)));
  }

  const result = validate(config);

  if (!Status.isErr(result)) {
    dbg('%o', result[0]);
    sessionConfigs.set(rootDir, result[0]);
  }

  return result;
}
