/**
 * Datasource parsing
 *
 * Accepts the embedded form
 *
 *   GPSBABEL:<driver>[,opt=value]*:[features=<cat>[,<cat>]*:]<path>
 *
 * and the out-of-band form, where the driver (and optionally the path)
 * arrive as open options. Both produce the same ConversionRequest.
 */

import {
  ALL_CATEGORIES,
  FEATURE_CATEGORIES,
  type CategorySelection,
  type ConversionRequest,
  type FeatureCategory,
  type OpenOptions,
} from '../core/types.js';
import { bridgeError, fail, ok, type Result } from '../core/errors.js';
import { validateDriverName } from '../security/driver-name.js';

export const DATASOURCE_PREFIX = 'GPSBABEL:';

const FEATURES_EQUAL = 'features=';

const SYNTAX_HINT = 'GPSBABEL:driver_name[,options]*:[features=waypoints,tracks,routes:]file_name';

function startsWithIgnoreCase(value: string, prefix: string): boolean {
  return value.slice(0, prefix.length).toLowerCase() === prefix.toLowerCase();
}

export function hasDatasourcePrefix(datasource: string): boolean {
  return startsWithIgnoreCase(datasource, DATASOURCE_PREFIX);
}

/**
 * Parse a `features=` value into a category selection
 */
export function parseFeatureList(list: string): Result<CategorySelection> {
  const tokens = list.split(/[\s,]+/).filter((token) => token.length > 0);
  if (tokens.length === 0) {
    return fail(bridgeError('InvalidRequestSyntax', "Empty value for 'features' option"));
  }

  const selected = new Set<FeatureCategory>();
  for (const token of tokens) {
    const lowered = token.toLowerCase();
    const category = FEATURE_CATEGORIES.find((known) => known === lowered);
    if (category === undefined) {
      return fail(
        bridgeError('InvalidRequestSyntax', `Wrong value for 'features' option: ${token}`)
      );
    }
    selected.add(category);
  }

  return ok({
    waypoints: selected.has('waypoints'),
    routes: selected.has('routes'),
    tracks: selected.has('tracks'),
  });
}

function buildRequest(
  sourcePath: string,
  driver: string,
  categories?: CategorySelection
): Result<ConversionRequest> {
  const validation = validateDriverName(driver);
  if (!validation.success) {
    return fail(bridgeError('InvalidDriverName', `${validation.error}: ${JSON.stringify(driver)}`));
  }

  if (sourcePath.length === 0) {
    return fail(bridgeError('InvalidRequestSyntax', `Missing source path. Expected ${SYNTAX_HINT}`));
  }

  return ok(
    Object.freeze({
      sourcePath,
      driver: validation.data,
      explicitFeatures: categories !== undefined,
      categories: categories ?? ALL_CATEGORIES,
    })
  );
}

/**
 * Parse a datasource string (and optional open options) into a request
 */
export function parseConversionRequest(
  datasource: string,
  options: OpenOptions = {}
): Result<ConversionRequest> {
  if (!hasDatasourcePrefix(datasource)) {
    if (options.driver === undefined) {
      return fail(
        bridgeError(
          'InvalidRequestSyntax',
          `No converter driver given for ${datasource}. Use ${SYNTAX_HINT} or pass a driver option`
        )
      );
    }
    return buildRequest(datasource, options.driver);
  }

  if (options.driver !== undefined) {
    if (options.filename === undefined) {
      return fail(bridgeError('InvalidRequestSyntax', 'Missing FILENAME'));
    }
    return buildRequest(options.filename, options.driver);
  }

  const afterPrefix = datasource.slice(DATASOURCE_PREFIX.length);
  const sep = afterPrefix.indexOf(':');
  if (sep === -1) {
    return fail(
      bridgeError('InvalidRequestSyntax', 'Wrong syntax. Expected GPSBABEL:driver_name:file_name')
    );
  }

  const driver = afterPrefix.slice(0, sep);
  let rest = afterPrefix.slice(sep + 1);
  let categories: CategorySelection | undefined;

  if (startsWithIgnoreCase(rest, FEATURES_EQUAL)) {
    const afterFeatures = rest.slice(FEATURES_EQUAL.length);
    const nextSep = afterFeatures.indexOf(':');
    if (nextSep === -1) {
      return fail(bridgeError('InvalidRequestSyntax', `Wrong syntax. Expected ${SYNTAX_HINT}`));
    }

    // Driver validity is checked before the feature list so that an unsafe
    // driver is always reported as such.
    const driverCheck = validateDriverName(driver);
    if (!driverCheck.success) {
      return fail(bridgeError('InvalidDriverName', `${driverCheck.error}: ${JSON.stringify(driver)}`));
    }

    const parsed = parseFeatureList(afterFeatures.slice(0, nextSep));
    if (!parsed.success) {
      return parsed;
    }
    categories = parsed.data;
    rest = afterFeatures.slice(nextSep + 1);
  }

  return buildRequest(options.filename ?? rest, driver, categories);
}
