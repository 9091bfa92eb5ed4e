import { normalizeRegistry } from '../accounts/normalize.js';
import type { RawAccount } from '../accounts/types.js';
import { debug } from '../debug.js';
import { ArtifactAggregator } from './aggregate.js';
import { compileAccount } from './compile.js';
import type { ArtifactSet, CompileOptions } from './types.js';
import { DEFAULT_COMPILE_OPTIONS } from './types.js';

/**
 * Registry snapshot → enabled accounts → defaults → per-account artifacts → keyed collections.
 * Throws a CompileError on the first invalid account; there is no partial result.
 */
export function compileRegistry(
  raws: readonly RawAccount[],
  options: CompileOptions = DEFAULT_COMPILE_OPTIONS,
): ArtifactSet {
  const accounts = normalizeRegistry(raws);
  const aggregator = new ArtifactAggregator();

  for (const account of accounts) {
    aggregator.add(compileAccount(account, options));
    debug('compile', `${account.name} → ${account.service.name} every ${account.service.intervalSec}s`);
  }

  return aggregator.result();
}
