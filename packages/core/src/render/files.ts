import type { ArtifactKind, ArtifactSet } from '../compiler/types.js';
import { renderConfigFile } from './config-file.js';
import { renderUnit } from './unit.js';

export const SYSTEMD_USER_DIR = 'systemd/user';

export interface RenderedFile {
  /** Relative to the user configuration root */
  path: string;
  kind: ArtifactKind;
  account: string;
  contents: string;
}

/** Flatten an artifact set into files: all services, then all timers, then all config files. */
export function renderArtifacts(artifacts: ArtifactSet): RenderedFile[] {
  const files: RenderedFile[] = [];

  for (const service of artifacts.services.values()) {
    files.push({
      path: `${SYSTEMD_USER_DIR}/${service.key}.service`,
      kind: 'service',
      account: service.account,
      contents: renderUnit(service.sections),
    });
  }

  for (const timer of artifacts.timers.values()) {
    files.push({
      path: `${SYSTEMD_USER_DIR}/${timer.key}.timer`,
      kind: 'timer',
      account: timer.account,
      contents: renderUnit(timer.sections),
    });
  }

  for (const configFile of artifacts.configFiles.values()) {
    files.push({
      path: configFile.path,
      kind: 'configFile',
      account: configFile.account,
      contents: renderConfigFile(configFile.content),
    });
  }

  return files;
}
