export type UnitScalar = string | number | boolean;
export type UnitValue = UnitScalar | readonly UnitScalar[];

/** One `[Section]` of a unit file */
export type UnitSection = Readonly<Record<string, UnitValue>>;

/** Unit file content keyed by section name (`Unit`, `Service`, `Timer`, `Install`, ...) */
export type UnitSections = Readonly<Record<string, UnitSection>>;

export interface CompileOptions {
  /** Path of the sync binary placed first in every ExecStart */
  binaryPath: string;
}

export const DEFAULT_COMPILE_OPTIONS: CompileOptions = {
  binaryPath: 'imapmaildir',
};

export interface ServiceDescriptor {
  key: string;
  account: string;
  description: string;
  execCommand: readonly string[];
  /** extraConfig with the computed Unit/Service fields layered on top */
  sections: UnitSections;
}

export interface TimerDescriptor {
  key: string;
  account: string;
  description: string;
  onStartupSec: number;
  onUnitInactiveSec: number;
  wantedBy: readonly string[];
  sections: UnitSections;
}

export type PlainAuth = {
  type: 'Plain';
  user: string;
  password_cmd: readonly string[];
};

/** Shape of `imapmaildir/accounts/<name>.toml`, as read by the sync binary */
export type AccountConfigContent = {
  host: string;
  port: number;
  mailboxes: readonly string[];
  maildir_base_path: string;
  auth: PlainAuth;
};

export interface ConfigFileDescriptor {
  /** Relative to the user configuration root */
  path: string;
  account: string;
  content: AccountConfigContent;
}

export interface CompiledAccount {
  service: ServiceDescriptor;
  timer: TimerDescriptor;
  configFile: ConfigFileDescriptor;
}

export type ArtifactKind = 'service' | 'timer' | 'configFile';

export interface ArtifactSet {
  services: ReadonlyMap<string, ServiceDescriptor>;
  timers: ReadonlyMap<string, TimerDescriptor>;
  configFiles: ReadonlyMap<string, ConfigFileDescriptor>;
}
