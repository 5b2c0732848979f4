#!/usr/bin/env node
import { CommandParser } from './commands/commandParser';
import { ProjectConfigLoader } from './services/projectConfigLoader';
import { UnpackService } from './services/unpackService';
import { RepackService } from './services/repackService';
import { BatchRunner } from './services/batchRunner';
import { JsonRecordStore } from './records/jsonRecordStore';
import { FileResult } from './types';
import config from './config/config';
import logger from './utils/logger';

const USAGE = `Usage:
  dialog-worksheet process <file...>            unpack .json records / repack .txt worksheets
  dialog-worksheet merge <dir> <dir...> [--out <dir>]`;

function report(results: readonly FileResult[]): number {
  const failed = results.filter((result) => !result.ok);
  logger.info('Batch finished', {
    total: results.length,
    succeeded: results.length - failed.length,
    failed: failed.length,
  });
  return failed.length > 0 ? 1 : 0;
}

function main(): number {
  const command = new CommandParser().parse(process.argv.slice(2));

  if (!command) {
    logger.error('Invalid arguments');
    console.error(USAGE);
    return 1;
  }
  if (command.type === 'help') {
    console.log(USAGE);
    return 0;
  }

  try {
    // 依存関係の初期化
    const projectConfig = new ProjectConfigLoader().loadOrDefault(config.projectConfigPath);
    const recordStore = new JsonRecordStore();
    const runner = new BatchRunner(
      new UnpackService(projectConfig, recordStore),
      new RepackService(projectConfig, recordStore, config.strictSequence),
      recordStore.extension,
      config.strictSequence
    );

    if (command.type === 'merge') {
      return report(runner.merge(command.directories, command.outputDir ?? config.mergeOutputDir));
    }
    return report(runner.process(command.files));
  } catch (error) {
    logger.error('Failed to start', { error });
    return 1;
  }
}

process.exitCode = main();
