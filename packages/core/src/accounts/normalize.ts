import { CompileError } from '../errors.js';
import { debug } from '../debug.js';
import type { UnitSections } from '../compiler/types.js';
import type { Account, PasswordCommandInput, RawAccount } from './types.js';
import { DEFAULT_IMAP_PORT, DEFAULT_INTERVAL_SEC, defaultServiceName } from './types.js';

// Account names end up in unit names and file paths; a single `@` is allowed for address-like names
const VALID_NAME_RE = /^[a-zA-Z0-9._-]+(@[a-zA-Z0-9._-]+)?$/;
// systemd unit name charset, with at most one `@` (template instance)
const VALID_UNIT_NAME_RE = /^[a-zA-Z0-9:_.-]+(@[a-zA-Z0-9:_.-]*)?$/;
const UNIT_SUFFIX_RE = /\.(service|timer)$/;
// Longest unit name systemd accepts, less room for the `.service` suffix
const MAX_SERVICE_NAME_LENGTH = 255 - '.service'.length;
// Section names and keys of extraConfig
export const VALID_UNIT_KEY_RE = /^[a-zA-Z0-9_-]+$/;
export const LINE_BREAK_RE = /[\r\n]/;

export function validateAccountName(name: string): void {
  if (!name) {
    throw new CompileError('InvalidAccountName', 'Account name must not be empty', { field: 'name' });
  }
  if (!VALID_NAME_RE.test(name) || name === '.' || name === '..') {
    throw new CompileError('InvalidAccountName', `Invalid account name "${name}": must match ${VALID_NAME_RE}`, {
      account: name,
      field: 'name',
    });
  }
}

function requireField(value: string | null | undefined, account: string, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new CompileError('MissingRequiredField', `Account "${account}" is missing required field ${field}`, {
      account,
      field,
    });
  }
  return value;
}

/**
 * Collapse the two accepted spellings of a password command into argv form.
 * A bare string becomes a one-element list; it is not split on spaces.
 */
export function normalizePasswordCommand(
  input: PasswordCommandInput | null | undefined,
  account: string,
): string[] {
  const command = typeof input === 'string' ? [input] : input ? [...input] : [];
  if (command.length === 0 || command[0] === '') {
    throw new CompileError('MissingCredentialSource', `Account "${account}" has no passwordCommand`, {
      account,
      field: 'passwordCommand',
    });
  }
  return command;
}

function resolvePort(port: number | null | undefined, account: string): number {
  if (port === null || port === undefined) return DEFAULT_IMAP_PORT;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new CompileError('InvalidPort', `Account "${account}" has invalid imap.port ${port}`, {
      account,
      field: 'imap.port',
    });
  }
  return port;
}

function resolveServiceName(name: string | null | undefined, account: string): string {
  const serviceName = name ?? defaultServiceName(account);
  if (!VALID_UNIT_NAME_RE.test(serviceName) || serviceName.length > MAX_SERVICE_NAME_LENGTH) {
    throw new CompileError(
      'InvalidServiceName',
      `Account "${account}" has invalid service.name "${serviceName}": must match ${VALID_UNIT_NAME_RE}`,
      { account, field: 'service.name' },
    );
  }
  if (UNIT_SUFFIX_RE.test(serviceName)) {
    throw new CompileError(
      'InvalidServiceName',
      `Account "${account}" has invalid service.name "${serviceName}": leave out the unit suffix`,
      { account, field: 'service.name' },
    );
  }
  return serviceName;
}

/**
 * Section names, keys and values of extraConfig are written verbatim into the unit file.
 * A line break in a value would start a new directive, so both are checked here.
 */
export function validateExtraConfig(extraConfig: UnitSections, account: string): void {
  const fail = (field: string, reason: string): never => {
    throw new CompileError('InvalidExtraConfig', `Account "${account}" has invalid ${field}: ${reason}`, {
      account,
      field,
    });
  };

  for (const [sectionName, section] of Object.entries(extraConfig)) {
    if (!VALID_UNIT_KEY_RE.test(sectionName)) {
      fail(`service.extraConfig.${sectionName}`, `section name must match ${VALID_UNIT_KEY_RE}`);
    }
    for (const [key, value] of Object.entries(section)) {
      const field = `service.extraConfig.${sectionName}.${key}`;
      if (!VALID_UNIT_KEY_RE.test(key)) fail(field, `key must match ${VALID_UNIT_KEY_RE}`);
      const values: readonly unknown[] = Array.isArray(value) ? value : [value];
      if (values.some(item => typeof item === 'string' && LINE_BREAK_RE.test(item))) {
        fail(field, 'values must not contain line breaks');
      }
    }
  }
}

function resolveInterval(intervalSec: number | null | undefined, account: string): number {
  const interval = intervalSec ?? DEFAULT_INTERVAL_SEC;
  if (!Number.isInteger(interval) || interval <= 0) {
    throw new CompileError(
      'InvalidInterval',
      `Account "${account}" has invalid service.intervalSec ${interval}: must be a positive integer`,
      { account, field: 'service.intervalSec' },
    );
  }
  return interval;
}

/** Apply defaults to one registry entry and reject anything the sync binary could not use. */
export function normalizeAccount(raw: RawAccount): Account {
  validateAccountName(raw.name);
  const { name } = raw;

  const host = requireField(raw.imap?.host, name, 'imap.host');
  const port = resolvePort(raw.imap?.port, name);
  const maildirAbsPath = requireField(raw.maildirAbsPath, name, 'maildirAbsPath');
  const userName = requireField(raw.userName, name, 'userName');
  const passwordCommand = normalizePasswordCommand(raw.passwordCommand, name);
  const extraConfig = raw.service?.extraConfig ?? {};
  validateExtraConfig(extraConfig, name);

  return {
    name,
    mailboxes: [...(raw.mailboxes ?? [])],
    imap: { host, port },
    maildirAbsPath,
    userName,
    passwordCommand,
    service: {
      name: resolveServiceName(raw.service?.name, name),
      intervalSec: resolveInterval(raw.service?.intervalSec, name),
      extraConfig,
    },
  };
}

/**
 * Normalize every enabled account of a registry snapshot.
 * Names must be unique across the whole registry; disabled entries are otherwise ignored.
 */
export function normalizeRegistry(raws: readonly RawAccount[]): Account[] {
  const seen = new Set<string>();
  for (const raw of raws) {
    if (seen.has(raw.name)) {
      throw new CompileError('InvalidAccountName', `Duplicate account name "${raw.name}"`, {
        account: raw.name,
        field: 'name',
      });
    }
    seen.add(raw.name);
  }

  const accounts: Account[] = [];
  for (const raw of raws) {
    if (!raw.enabled) {
      debug('normalize', `skipping disabled account ${raw.name}`);
      continue;
    }
    accounts.push(normalizeAccount(raw));
  }
  return accounts;
}
