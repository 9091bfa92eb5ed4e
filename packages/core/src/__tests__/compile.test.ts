import { describe, it, expect } from 'vitest';
import { normalizeAccount } from '../accounts/normalize.js';
import type { RawAccount } from '../accounts/types.js';
import {
  compileAccount,
  compileConfigFile,
  compileService,
  compileTimer,
  configFilePath,
  formatExecCommand,
} from '../compiler/compile.js';

const work: RawAccount = {
  name: 'work',
  enabled: true,
  imap: { host: 'imap.example.com', port: null },
  mailboxes: ['INBOX'],
  maildirAbsPath: '/home/u/mail/work',
  userName: 'u@example.com',
  passwordCommand: 'pass show work',
  service: { intervalSec: 120 },
};

const options = { binaryPath: '/usr/bin/imapmaildir' };

// ─── Service ─────────────────────────────────────────────────────────

describe('compileService', () => {
  it('derives key, description and exec command from the account', () => {
    const service = compileService(normalizeAccount(work), options);
    expect(service.key).toBe('imapmaildir-sync-work');
    expect(service.account).toBe('work');
    expect(service.description).toBe('mail sync via imapmaildir for account work');
    expect(service.execCommand).toEqual(['/usr/bin/imapmaildir', '--account', 'work']);
    expect(service.sections).toEqual({
      Unit: { Description: 'mail sync via imapmaildir for account work' },
      Service: { Type: 'exec', ExecStart: '/usr/bin/imapmaildir --account work' },
    });
  });

  it('merges extraConfig beneath the computed fields', () => {
    const account = normalizeAccount({
      ...work,
      service: {
        extraConfig: {
          Unit: { Description: 'overridden?', After: 'network-online.target' },
          Service: { ExecStart: '/bin/false', Nice: 19 },
          Install: { WantedBy: ['default.target'] },
        },
      },
    });
    const service = compileService(account, options);
    expect(service.sections).toEqual({
      Unit: { Description: 'mail sync via imapmaildir for account work', After: 'network-online.target' },
      Service: { ExecStart: '/usr/bin/imapmaildir --account work', Nice: 19, Type: 'exec' },
      Install: { WantedBy: ['default.target'] },
    });
  });

  it('uses an explicit service name as key', () => {
    const service = compileService(normalizeAccount({ ...work, service: { name: 'mail-work' } }), options);
    expect(service.key).toBe('mail-work');
  });
});

describe('formatExecCommand', () => {
  it('leaves plain arguments bare', () => {
    expect(formatExecCommand(['imapmaildir', '--account', 'work'])).toBe('imapmaildir --account work');
  });

  it('quotes arguments with whitespace, quotes or backslashes', () => {
    expect(formatExecCommand(['/opt/My Tools/imapmaildir', 'a"b', 'c\\d']))
      .toBe('"/opt/My Tools/imapmaildir" "a\\"b" "c\\\\d"');
  });

  it('escapes specifiers and variable expansion', () => {
    expect(formatExecCommand(['run', '100%', '$HOME'])).toBe('run 100%% $$HOME');
  });

  it('writes an empty argument as empty quotes', () => {
    expect(formatExecCommand(['x', ''])).toBe('x ""');
  });
});

// ─── Timer ───────────────────────────────────────────────────────────

describe('compileTimer', () => {
  it('fires at startup and then intervalSec after each run', () => {
    const timer = compileTimer(normalizeAccount(work));
    expect(timer).toEqual({
      key: 'imapmaildir-sync-work',
      account: 'work',
      description: 'timer for imapmaildir-sync-work',
      onStartupSec: 0,
      onUnitInactiveSec: 120,
      wantedBy: ['timers.target'],
      sections: {
        Unit: { Description: 'timer for imapmaildir-sync-work' },
        Timer: { OnStartupSec: 0, OnUnitInactiveSec: 120 },
        Install: { WantedBy: ['timers.target'] },
      },
    });
  });

  it('uses the default interval of 300 seconds', () => {
    const timer = compileTimer(normalizeAccount({ ...work, service: undefined }));
    expect(timer.onUnitInactiveSec).toBe(300);
  });

  it('shares its key with the service', () => {
    const account = normalizeAccount({ ...work, service: { name: 'custom' } });
    expect(compileTimer(account).key).toBe(compileService(account, options).key);
  });
});

// ─── Config file ─────────────────────────────────────────────────────

describe('compileConfigFile', () => {
  it('builds the account config read by the sync binary', () => {
    const configFile = compileConfigFile(normalizeAccount(work));
    expect(configFile.path).toBe('imapmaildir/accounts/work.toml');
    expect(configFile.content).toEqual({
      host: 'imap.example.com',
      port: 993,
      mailboxes: ['INBOX'],
      maildir_base_path: '/home/u/mail/work',
      auth: {
        type: 'Plain',
        user: 'u@example.com',
        password_cmd: ['pass show work'],
      },
    });
  });

  it('passes a list password command through unchanged', () => {
    const configFile = compileConfigFile(normalizeAccount({ ...work, passwordCommand: ['cmd', 'arg'] }));
    expect(configFile.content.auth.password_cmd).toEqual(['cmd', 'arg']);
  });

  it('keeps an explicit port', () => {
    const configFile = compileConfigFile(normalizeAccount({ ...work, imap: { host: 'h', port: 143 } }));
    expect(configFile.content.port).toBe(143);
  });

  it('derives the path from the account name', () => {
    expect(configFilePath('home')).toBe('imapmaildir/accounts/home.toml');
  });
});

describe('compileAccount', () => {
  it('is deterministic', () => {
    const account = normalizeAccount(work);
    expect(JSON.stringify(compileAccount(account, options)))
      .toBe(JSON.stringify(compileAccount(account, options)));
  });
});
