import { existsSync, mkdirSync, readFileSync, unlinkSync, writeFileSync } from 'node:fs';
import { dirname, isAbsolute, join } from 'node:path';
import { z } from 'zod';
import { debug, debugWarn, TOOL_DIR_NAME, type RenderedFile } from '@mailsync-units/core';

const manifestSchema = z.object({
  files: z.array(z.string()),
});

export interface WriteReport {
  written: string[];
  unchanged: string[];
  removed: string[];
}

/**
 * Writes rendered artifacts under an output root and remembers them in a manifest,
 * so files for accounts that disappear from the registry are removed on the next run.
 * Never touches the process manager itself.
 */
export class ArtifactWriter {
  constructor(private outputDir: string) {}

  get manifestPath(): string {
    return join(this.outputDir, TOOL_DIR_NAME, 'manifest.json');
  }

  /** Relative paths written by the previous run. */
  readManifest(): string[] {
    if (!existsSync(this.manifestPath)) return [];
    try {
      const parsed = manifestSchema.safeParse(JSON.parse(readFileSync(this.manifestPath, 'utf-8')));
      if (parsed.success) return parsed.data.files;
    } catch {
      debugWarn('writer', `unreadable manifest ${this.manifestPath}`);
      return [];
    }
    debugWarn('writer', `ignoring manifest with unexpected shape ${this.manifestPath}`);
    return [];
  }

  write(files: readonly RenderedFile[]): WriteReport {
    const report: WriteReport = { written: [], unchanged: [], removed: [] };
    const current = new Set(files.map(file => file.path));

    for (const file of files) {
      const target = join(this.outputDir, file.path);
      if (existsSync(target) && readFileSync(target, 'utf-8') === file.contents) {
        report.unchanged.push(file.path);
        continue;
      }
      mkdirSync(dirname(target), { recursive: true });
      writeFileSync(target, file.contents);
      report.written.push(file.path);
      debug('writer', `wrote ${target}`);
    }

    for (const stale of this.readManifest()) {
      if (current.has(stale)) continue;
      if (this.removeFile(stale)) report.removed.push(stale);
    }

    this.saveManifest([...current]);
    return report;
  }

  /** Remove every file from the last run, and the manifest. */
  clean(): string[] {
    const removed = this.readManifest().filter(path => this.removeFile(path));
    if (existsSync(this.manifestPath)) unlinkSync(this.manifestPath);
    return removed;
  }

  private removeFile(relativePath: string): boolean {
    // Only ever delete inside the output root
    if (isAbsolute(relativePath) || relativePath.split('/').includes('..')) return false;
    const target = join(this.outputDir, relativePath);
    if (!existsSync(target)) return false;
    unlinkSync(target);
    debug('writer', `removed ${target}`);
    return true;
  }

  private saveManifest(files: string[]): void {
    mkdirSync(dirname(this.manifestPath), { recursive: true });
    writeFileSync(this.manifestPath, JSON.stringify({ files }, null, 2) + '\n');
  }
}
