import type { Account } from '../accounts/types.js';
import { mergeSections } from './merge.js';
import type {
  CompileOptions,
  CompiledAccount,
  ConfigFileDescriptor,
  ServiceDescriptor,
  TimerDescriptor,
} from './types.js';

export const TIMERS_TARGET = 'timers.target';

export function configFilePath(accountName: string): string {
  return `imapmaildir/accounts/${accountName}.toml`;
}

function quoteExecArg(arg: string): string {
  // `%` starts a specifier and `$` a variable expansion in ExecStart
  const escaped = arg.replace(/%/g, '%%').replace(/\$/g, '$$$$');
  if (escaped !== '' && !/[\s"'\\]/.test(escaped)) return escaped;
  return `"${escaped.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/** Render argv as a systemd ExecStart command line. */
export function formatExecCommand(argv: readonly string[]): string {
  return argv.map(quoteExecArg).join(' ');
}

export function compileService(account: Account, options: CompileOptions): ServiceDescriptor {
  const description = `mail sync via imapmaildir for account ${account.name}`;
  const execCommand = [options.binaryPath, '--account', account.name];

  return {
    key: account.service.name,
    account: account.name,
    description,
    execCommand,
    sections: mergeSections(account.service.extraConfig, {
      Unit: { Description: description },
      Service: {
        Type: 'exec',
        ExecStart: formatExecCommand(execCommand),
      },
    }),
  };
}

/**
 * Fires once on activation, then `intervalSec` after each run finishes.
 * This is an inactivity trigger, not a wall-clock schedule.
 */
export function compileTimer(account: Account): TimerDescriptor {
  const key = account.service.name;
  const description = `timer for ${key}`;
  const onStartupSec = 0;
  const onUnitInactiveSec = account.service.intervalSec;
  const wantedBy = [TIMERS_TARGET];

  return {
    key,
    account: account.name,
    description,
    onStartupSec,
    onUnitInactiveSec,
    wantedBy,
    sections: {
      Unit: { Description: description },
      Timer: {
        OnStartupSec: onStartupSec,
        OnUnitInactiveSec: onUnitInactiveSec,
      },
      Install: { WantedBy: wantedBy },
    },
  };
}

export function compileConfigFile(account: Account): ConfigFileDescriptor {
  return {
    path: configFilePath(account.name),
    account: account.name,
    content: {
      host: account.imap.host,
      port: account.imap.port,
      mailboxes: account.mailboxes,
      maildir_base_path: account.maildirAbsPath,
      auth: {
        // only plain login is supported by the sync binary
        type: 'Plain',
        user: account.userName,
        password_cmd: account.passwordCommand,
      },
    },
  };
}

export function compileAccount(account: Account, options: CompileOptions): CompiledAccount {
  return {
    service: compileService(account, options),
    timer: compileTimer(account),
    configFile: compileConfigFile(account),
  };
}
