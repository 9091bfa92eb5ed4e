import { CompileError } from '../errors.js';
import type {
  ArtifactKind,
  ArtifactSet,
  CompiledAccount,
  ConfigFileDescriptor,
  ServiceDescriptor,
  TimerDescriptor,
} from './types.js';

/**
 * Collects per-account artifacts into one keyed collection per kind.
 * A key may be contributed by exactly one account; a second contributor is an error.
 */
export class ArtifactAggregator {
  private services = new Map<string, ServiceDescriptor>();
  private timers = new Map<string, TimerDescriptor>();
  private configFiles = new Map<string, ConfigFileDescriptor>();

  add(compiled: CompiledAccount): void {
    // Check every kind before inserting so a rejected account leaves nothing behind
    this.assertFree('service', this.services, compiled.service.key, compiled.service.account);
    this.assertFree('timer', this.timers, compiled.timer.key, compiled.timer.account);
    this.assertFree('configFile', this.configFiles, compiled.configFile.path, compiled.configFile.account);

    this.services.set(compiled.service.key, compiled.service);
    this.timers.set(compiled.timer.key, compiled.timer);
    this.configFiles.set(compiled.configFile.path, compiled.configFile);
  }

  result(): ArtifactSet {
    return {
      services: new Map(this.services),
      timers: new Map(this.timers),
      configFiles: new Map(this.configFiles),
    };
  }

  private assertFree(
    kind: ArtifactKind,
    collection: ReadonlyMap<string, { account: string }>,
    key: string,
    account: string,
  ): void {
    const existing = collection.get(key);
    if (!existing) return;
    throw new CompileError(
      'DuplicateArtifactKey',
      `Duplicate ${kind} key "${key}": produced by account "${existing.account}" and account "${account}"`,
      {
        account,
        context: { kind, key, accounts: [existing.account, account] },
      },
    );
  }
}
