#!/usr/bin/env node

import {
  compileRegistry,
  isCompileError,
  renderArtifacts,
  resolveConfig,
  type ArtifactSet,
  type MailsyncUnitsConfig,
} from '@mailsync-units/core';
import { parseCommandLine, type CommandLine } from './args.js';
import { loadRegistry } from './registry.js';
import { ArtifactWriter } from './writer.js';

// --- Colors & formatting ---
const c = {
  green: (s: string) => `\x1b[32m${s}\x1b[0m`,
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
  cyan: (s: string) => `\x1b[36m${s}\x1b[0m`,
  dim: (s: string) => `\x1b[90m${s}\x1b[0m`,
  bold: (s: string) => `\x1b[1m${s}\x1b[0m`,
  bgCyan: (s: string) => `\x1b[46m\x1b[30m${s}\x1b[0m`,
};

function log(msg: string) { console.log(msg); }
function ok(msg: string) { console.log(`  ${c.green('✓')} ${msg}`); }
function fail(msg: string) { console.log(`  ${c.red('✗')} ${msg}`); }
function info(msg: string) { console.log(`  ${c.dim(msg)}`); }

function configFor(args: CommandLine): MailsyncUnitsConfig {
  return resolveConfig({
    registryPath: args.registryPath,
    outputDir: args.outputDir,
    binaryPath: args.binaryPath,
  });
}

function compile(config: MailsyncUnitsConfig): ArtifactSet {
  const accounts = loadRegistry(config.registryPath);
  return compileRegistry(accounts, { binaryPath: config.binaryPath });
}

function cmdBuild(args: CommandLine) {
  const config = configFor(args);
  const files = renderArtifacts(compile(config));
  const report = new ArtifactWriter(config.outputDir).write(files);

  log('');
  if (files.length === 0) {
    info(`No enabled accounts in ${config.registryPath}`);
  }
  for (const path of report.written) ok(`wrote ${path}`);
  for (const path of report.unchanged) info(`unchanged ${path}`);
  for (const path of report.removed) ok(`removed ${c.yellow(path)}`);
  log('');
  log(`  ${c.bold(String(report.written.length))} written, ${report.unchanged.length} unchanged, ${report.removed.length} removed under ${c.cyan(config.outputDir)}`);
  log(`  ${c.dim('Run `systemctl --user daemon-reload` and enable the timers to pick up changes.')}`);
  log('');
}

function cmdCheck(args: CommandLine) {
  const config = configFor(args);
  const artifacts = compile(config);

  log('');
  if (artifacts.services.size === 0) {
    info(`No enabled accounts in ${config.registryPath}`);
  }
  for (const service of artifacts.services.values()) {
    const timer = artifacts.timers.get(service.key);
    const interval = timer ? `every ${timer.onUnitInactiveSec}s` : 'no timer';
    ok(`${c.bold(service.account)} → ${service.key} ${c.dim(`(${interval})`)}`);
  }
  for (const configFile of artifacts.configFiles.values()) {
    info(configFile.path);
  }
  log('');
}

function cmdPrint(args: CommandLine) {
  const files = renderArtifacts(compile(configFor(args)));
  for (const file of files) {
    log(c.dim(`# ${file.path}`));
    log(file.contents);
  }
}

function cmdClean(args: CommandLine) {
  const config = configFor(args);
  const removed = new ArtifactWriter(config.outputDir).clean();

  log('');
  if (removed.length === 0) info('Nothing to remove.');
  for (const path of removed) ok(`removed ${path}`);
  log('');
}

function cmdHelp() {
  log('');
  log(`  ${c.bgCyan(' mailsync-units ')} ${c.dim('imapmaildir sync units from your account registry')}`);
  log('');
  log('  Commands:');
  log(`    ${c.green('mailsync-units build')}   Compile the registry and write units + account configs (default)`);
  log(`    ${c.green('mailsync-units check')}   Compile and list what would be generated`);
  log(`    ${c.green('mailsync-units print')}   Compile and print every generated file`);
  log(`    ${c.green('mailsync-units clean')}   Remove every previously generated file`);
  log('');
  log('  Options:');
  log(`    ${c.cyan('--registry <path>')}  Account registry (JSON5)`);
  log(`    ${c.cyan('--out <dir>')}        Output root, normally $XDG_CONFIG_HOME`);
  log(`    ${c.cyan('--binary <path>')}    imapmaildir executable used in ExecStart`);
  log('');
}

function run(command: (args: CommandLine) => void, args: CommandLine) {
  try {
    command(args);
  } catch (err) {
    if (isCompileError(err)) {
      fail(err.message);
      process.exit(1);
    }
    console.error(err);
    process.exit(1);
  }
}

// --- Main ---

let args: CommandLine;
try {
  args = parseCommandLine(process.argv.slice(2));
} catch (err) {
  fail(err instanceof Error ? err.message : String(err));
  cmdHelp();
  process.exit(1);
}

switch (args.command) {
  case 'build':
    run(cmdBuild, args);
    break;
  case 'check':
    run(cmdCheck, args);
    break;
  case 'print':
    run(cmdPrint, args);
    break;
  case 'clean':
    run(cmdClean, args);
    break;
  case 'help':
    cmdHelp();
    break;
}
