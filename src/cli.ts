#!/usr/bin/env node

/**
 * formsmith CLI
 *
 * Preview the markup of a JSON form document and try its validation rules
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { highlight } from 'cli-highlight';
import { documentDefinition, loadFormDocument, renderFormDocument } from './cli/document.js';
import { getCommandLogger, isTTY } from './shared/cli-utils.js';
import { handleError } from './shared/error-handler.js';
import { FormValidator } from './validation/validator.js';
import { FORMSMITH_VERSION } from './version.js';

const program = new Command();

program
  .name('formsmith')
  .description('Server-side HTML form helpers: preview forms and check validation rules')
  .version(FORMSMITH_VERSION)
  .option('--log-level <level>', 'error | warn | info | debug (default: FORMSMITH_LOG_LEVEL or info)')
  .option('--json-logs', 'Write log lines as JSON');

// Render command: print the markup of a form document
program
  .command('render')
  .argument('<file>', 'JSON form document')
  .description('Render a form document to HTML')
  .option('--raw', 'Print plain HTML even on a terminal')
  .action(async (file: string, options: { raw?: boolean }, command: Command) => {
    const logger = getCommandLogger(command);
    try {
      const doc = await loadFormDocument(file);
      const markup = renderFormDocument(doc, logger);
      const output = !options.raw && isTTY() ? highlight(markup, { language: 'html' }) : markup;
      process.stdout.write(output);
    } catch (error) {
      handleError(error, { logger, exitOnError: true });
    }
  });

// Validate command: run the document's rules against its values
program
  .command('validate')
  .argument('<file>', 'JSON form document with "values"')
  .description('Check the document values against the field rules')
  .action(async (file: string, _options: unknown, command: Command) => {
    const logger = getCommandLogger(command);
    try {
      const doc = await loadFormDocument(file);
      const validator = new FormValidator(logger);
      const definition = documentDefinition(doc);
      const outcome = validator.validate(doc.values ?? {}, definition);

      if (!outcome.failed) {
        console.log(`${chalk.green('✓')} ${definition.properties().length} field(s) valid`);
        return;
      }

      for (const [field, message] of Object.entries(outcome.errors)) {
        console.log(`${chalk.red('✗')} ${chalk.bold(field)}: ${message}`);
      }
      process.exitCode = 1;
    } catch (error) {
      handleError(error, { logger, exitOnError: true });
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  handleError(error, { exitOnError: true });
});
