#!/usr/bin/env tsx

/**
 * Use-Case Studio CLI - proposal generation from the terminal.
 */

import fs from 'fs';
import path from 'path';
import { program } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import inquirer from 'inquirer';
import type { ProposalStage } from '@usecase-studio/shared-types';
import { createDefaultOrchestrator } from './clients.js';
import { config, printConfig, requireValidConfig, validateConfig } from './config/index.js';
import { ConfigurationError } from './errors.js';
import { Log } from './logging/log.js';
import {
  renderProposalMarkdown,
  renderResourceLinksMarkdown,
  resourceFileName,
} from './report/markdown.js';

const EXIT_CONFIG_ERROR = 1;
const EXIT_RESEARCH_FAILED = 2;

const STAGE_LABELS: Record<ProposalStage, string> = {
  research: 'Researching company profile',
  use_cases: 'Generating use cases',
  resources: 'Collecting resource links',
  suggestions: 'Proposing GenAI solutions',
};

const log = {
  info: (msg: string) => console.log(chalk.blue('[INFO]'), msg),
  success: (msg: string) => console.log(chalk.green('[OK]'), msg),
  warn: (msg: string) => console.log(chalk.yellow('[WARN]'), msg),
  error: (msg: string) => console.log(chalk.red('[ERROR]'), msg),
  header: (msg: string) => console.log(`\n${chalk.bold.cyan(msg)}\n`),
};

/** Bold the Markdown headings for terminal output. */
function highlightMarkdown(markdown: string): string {
  return markdown
    .split('\n')
    .map(line => {
      if (line.startsWith('# ')) return chalk.bold.cyan(line);
      if (line.startsWith('## ')) return chalk.bold.green(line);
      if (line.startsWith('### ')) return chalk.bold(line);
      return line;
    })
    .join('\n');
}

async function promptForSubject(): Promise<string> {
  const answers = await inquirer.prompt<{ subject: string }>([
    {
      type: 'input',
      name: 'subject',
      message: 'Company name or industry:',
      validate: (value: string) => value.trim().length > 0 || 'Please enter a company name or industry.',
    },
  ]);
  return answers.subject.trim();
}

program
  .name('usecase-studio')
  .description('Generate AI/GenAI use-case proposals for a company or industry')
  .version('1.0.0')
  .option('-v, --verbose', 'Show pipeline logs');

program
  .command('generate [subject]')
  .description('Research a company or industry and propose AI use cases')
  .option('-o, --out <dir>', 'Write the resource links file into this directory')
  .option('--json', 'Print the proposal bundle as JSON')
  .action(async (subjectArg: string | undefined, options: { out?: string; json?: boolean }) => {
    const verbose = program.opts<{ verbose?: boolean }>().verbose === true;
    Log.configure({
      level: verbose ? config.logging.level : 'error',
      filePath: config.logging.filePath || null,
    });

    try {
      requireValidConfig();
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      log.header('Configuration');
      error.problems.forEach(problem => log.error(problem));
      log.info('Set the missing values in .env and retry.');
      process.exit(EXIT_CONFIG_ERROR);
    }

    const subject = subjectArg?.trim() || (await promptForSubject());
    const spinner = ora({ text: `Generating proposal for ${subject}`, color: 'cyan' }).start();

    const bundle = await createDefaultOrchestrator().orchestrate(subject, {
      onStageChange: event => {
        if (event.state === 'started') {
          spinner.text = `${STAGE_LABELS[event.stage]}...`;
        }
      },
    });

    if (bundle.status === 'failed_research') {
      spinner.fail('Research failed or returned insufficient data');
    } else {
      spinner.succeed(`Proposal ready for ${subject}`);
    }

    if (options.json) {
      console.log(JSON.stringify(bundle, null, 2));
    } else {
      console.log(`\n${highlightMarkdown(renderProposalMarkdown(bundle))}`);
    }

    if (options.out) {
      const resources = renderResourceLinksMarkdown(bundle);
      if (resources === null) {
        log.warn('No resource links collected; nothing written');
      } else {
        const target = path.resolve(options.out, resourceFileName(bundle.researchData?.inputName ?? subject));
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(target, resources, 'utf8');
        log.success(`Resource links written to ${target}`);
      }
    }

    if (bundle.status === 'failed_research') {
      process.exit(EXIT_RESEARCH_FAILED);
    }
  });

program
  .command('config')
  .description('Show the loaded configuration')
  .action(() => {
    printConfig();
    const validation = validateConfig();
    if (validation.valid) {
      log.success('Configuration looks good');
    } else {
      validation.errors.forEach(error => log.error(error));
      process.exit(EXIT_CONFIG_ERROR);
    }
  });

await program.parseAsync();
