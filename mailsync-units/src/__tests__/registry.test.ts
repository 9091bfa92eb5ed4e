import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { CompileError, compileRegistry } from '@mailsync-units/core';
import { loadRegistry } from '../registry.js';

describe('loadRegistry', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'mailsync-units-registry-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a JSON5 registry with comments and trailing commas', () => {
    const path = join(dir, 'accounts.json5');
    writeFileSync(path, `{
      // synced every two minutes
      accounts: {
        work: {
          enabled: true,
          imap: { host: 'imap.example.com', port: null },
          passwordCommand: 'pass show work',
          service: { intervalSec: 120, },
        },
      },
    }`);

    expect(loadRegistry(path)).toEqual([
      {
        name: 'work',
        enabled: true,
        imap: { host: 'imap.example.com', port: null },
        passwordCommand: 'pass show work',
        service: { intervalSec: 120 },
      },
    ]);
  });

  it('fails with InvalidRegistry when the file is missing', () => {
    const path = join(dir, 'missing.json5');
    expect(() => loadRegistry(path)).toThrow(`Account registry not found at ${path}`);
  });

  it('fails with InvalidRegistry on unparsable JSON5', () => {
    const path = join(dir, 'broken.json5');
    writeFileSync(path, '{ accounts: ');
    expect(() => loadRegistry(path)).toThrow(CompileError);
    expect(() => loadRegistry(path)).toThrow(/^Could not parse account registry/);
  });
});

describe('example registry', () => {
  const examplePath = fileURLToPath(new URL('../../../examples/accounts.json5', import.meta.url));

  it('compiles to units for the enabled accounts only', () => {
    const artifacts = compileRegistry(loadRegistry(examplePath));
    expect([...artifacts.services.keys()]).toEqual(['imapmaildir-sync-work', 'imapmaildir-sync-personal']);
    expect(artifacts.timers.get('imapmaildir-sync-personal')?.onUnitInactiveSec).toBe(300);
    expect(artifacts.configFiles.get('imapmaildir/accounts/personal.toml')?.content.auth.password_cmd)
      .toEqual(['secret-tool', 'lookup', 'mail', 'personal']);
  });

  it('merges extraConfig into the work service', () => {
    const service = compileRegistry(loadRegistry(examplePath)).services.get('imapmaildir-sync-work');
    expect(service?.sections).toEqual({
      Unit: { After: 'network-online.target', Description: 'mail sync via imapmaildir for account work' },
      Service: { Nice: 10, Type: 'exec', ExecStart: 'imapmaildir --account work' },
    });
  });
});
