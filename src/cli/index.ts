#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig } from '../config';
import { defaultLogger } from '../core/logger';
import { getDefaultRepository } from '../core/schema-repository';
import { MessageFormat } from '../types';
import {
  CheckOptions,
  CommandContext,
  ValidateOptions,
  runCheck,
  runMetaValidate,
  runValidate,
  runVersions,
} from './commands';

const program = new Command();

let context: CommandContext | undefined;

function getContext(): CommandContext {
  if (!context) {
    context = {
      logger: defaultLogger,
      config: loadConfig(undefined, defaultLogger),
      repository: getDefaultRepository(),
    };
  }
  return context;
}

program
  .name('taxonomy-schema')
  .description('Validate taxonomy contribution files against the versioned taxonomy schemas')
  .version('1.0.0');

/**
 * Check command
 */
program
  .command('check')
  .description('Lint and validate taxonomy qna.yaml files')
  .argument('<files...>', 'qna.yaml files to check')
  .option('-s, --schema-version <version>', 'Schema version; 0 uses the version key of each file')
  .option('-f, --format <format>', `Message format (${Object.values(MessageFormat).join(', ')})`)
  .option('--lint-config <yaml>', 'yamllint-style configuration')
  .option('--lint-strict', 'Report lint warnings as errors')
  .option('--folders <folders>', 'Comma separated taxonomy folder names')
  .action((files: string[], options: CheckOptions) => {
    process.exitCode = runCheck(files, options, getContext());
  });

/**
 * Meta-validate command
 */
program
  .command('meta-validate')
  .description('Validate schema files against the JSON Schema draft 2020-12 meta-schema')
  .argument('[files...]', 'Schema files; all packaged schemas when omitted')
  .action((files: string[]) => {
    process.exitCode = runMetaValidate(files, getContext());
  });

/**
 * Validate command
 */
program
  .command('validate')
  .description('Validate a JSON or YAML document against a packaged schema')
  .argument('<document>', 'Document to validate')
  .option('-s, --schema-version <version>', 'Schema version; the latest when omitted')
  .option('-k, --kind <kind>', 'Schema kind (compositional_skills, knowledge)')
  .action((document: string, options: ValidateOptions) => {
    process.exitCode = runValidate(document, options, getContext());
  });

/**
 * Versions command
 */
program
  .command('versions')
  .description('List the packaged schema versions')
  .action(() => {
    process.exitCode = runVersions(getContext());
  });

// Parse arguments
program.parse();
