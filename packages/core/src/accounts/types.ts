import type { UnitSections } from '../compiler/types.js';

/** A password command as the registry may spell it: a single command string, or argv */
export type PasswordCommandInput = string | readonly string[];

export const DEFAULT_IMAP_PORT = 993;
export const DEFAULT_INTERVAL_SEC = 5 * 60;
export const SERVICE_NAME_PREFIX = 'imapmaildir-sync-';

export function defaultServiceName(accountName: string): string {
  return `${SERVICE_NAME_PREFIX}${accountName}`;
}

export interface RawImapSettings {
  host?: string | null;
  port?: number | null;
}

export interface RawServiceSettings {
  name?: string | null;
  intervalSec?: number | null;
  /** Extra unit sections merged underneath the generated service */
  extraConfig?: UnitSections;
}

/** A registry entry as supplied by the external configuration system, before defaults */
export interface RawAccount {
  name: string;
  enabled?: boolean;
  mailboxes?: readonly string[];
  imap?: RawImapSettings | null;
  maildirAbsPath?: string | null;
  userName?: string | null;
  passwordCommand?: PasswordCommandInput | null;
  service?: RawServiceSettings | null;
}

/** An enabled account with every default applied and every field validated */
export interface Account {
  name: string;
  mailboxes: readonly string[];
  imap: {
    host: string;
    port: number;
  };
  maildirAbsPath: string;
  userName: string;
  passwordCommand: readonly string[];
  service: {
    name: string;
    intervalSec: number;
    extraConfig: UnitSections;
  };
}
