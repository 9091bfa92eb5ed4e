import { existsSync, readFileSync } from 'node:fs';
import JSON5 from 'json5';
import { CompileError, parseRegistry, type RawAccount } from '@mailsync-units/core';

/** Read a JSON5 registry file (`{ accounts: { <name>: {...} } }`). */
export function loadRegistry(registryPath: string): RawAccount[] {
  if (!existsSync(registryPath)) {
    throw new CompileError('InvalidRegistry', `Account registry not found at ${registryPath}`);
  }

  let data: unknown;
  try {
    data = JSON5.parse(readFileSync(registryPath, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CompileError('InvalidRegistry', `Could not parse account registry ${registryPath}: ${message}`);
  }

  return parseRegistry(data);
}
