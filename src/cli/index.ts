/**
 * Honeytrap CLI
 *
 * Usage:
 *   honeytrap <command> [options]
 *
 * Commands:
 *   start        Start the honeypot API server
 *   extract      Extract scam indicators from a piece of text
 *   classify     Score a message for scam intent
 *   exit-check   Check whether a message is an exit command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { Honeytrap } from '../Honeytrap.js';
import { ConfigManager } from '../core/HoneytrapConfig.js';
import { INDICATOR_KINDS } from '../core/entities/types.js';
import { isExitMessage } from '../core/session/exit.js';
import { IndicatorExtractor } from '../detection/IndicatorExtractor.js';
import { ScamClassifier } from '../detection/ScamClassifier.js';
import { createProviderFromConfig } from '../integration/providers/factory.js';

const VERSION = '0.1.0';

export function createCLI(): Command {
  const program = new Command();

  program
    .name('honeytrap')
    .description('Conversational scam honeypot: engages scammers and collects their payment details')
    .version(VERSION);

  // Start command
  program
    .command('start')
    .description('Start the honeypot API server')
    .option('-p, --port <port>', 'API server port')
    .option('--debug', 'Enable debug logging')
    .action(async (options: { port?: string; debug?: boolean }) => {
      const spinner = ora('Starting Honeytrap...').start();

      try {
        const base = ConfigManager.fromEnv().getConfig();
        const port = options.port ? Number.parseInt(options.port, 10) : base.api.port;

        const honeytrap = new Honeytrap({
          config: {
            ...base,
            api: { ...base.api, port },
            logging: { ...base.logging, level: options.debug ? 'debug' : base.logging.level },
          },
        });

        await honeytrap.start();
        spinner.succeed(chalk.green('Honeytrap started'));

        const status = honeytrap.getStatus();
        console.log(chalk.bold('\nHoneytrap is running\n'));
        console.log('─'.repeat(50));
        console.log(`  Endpoint:      ${chalk.cyan(`http://localhost:${honeytrap.port ?? port}/honeypot`)}`);
        console.log(`  Health Check:  ${chalk.gray(`http://localhost:${honeytrap.port ?? port}/health`)}`);
        console.log(`  LLM:           ${status.llm.configured ? chalk.green(status.llm.model) : chalk.yellow('not configured')}`);
        console.log(`  Callback:      ${status.callbackConfigured ? chalk.green('ON') : chalk.gray('OFF')}`);
        console.log(`  Environment:   ${chalk.gray(status.environment)}`);
        console.log('─'.repeat(50));
        console.log(chalk.gray('\n  Press Ctrl+C to stop\n'));

        const shutdown = async () => {
          console.log(chalk.yellow('\nShutting down gracefully...'));
          try {
            await honeytrap.stop();
            console.log(chalk.green('✓ Honeytrap stopped'));
            process.exit(0);
          } catch (error) {
            console.error(chalk.red('Error during shutdown:'), error);
            process.exit(1);
          }
        };

        process.on('SIGINT', () => void shutdown());
        process.on('SIGTERM', () => void shutdown());
      } catch (error) {
        spinner.fail(chalk.red('Failed to start Honeytrap'));
        console.error(chalk.red(`\nError: ${errorMessage(error)}`));
        if (options.debug && error instanceof Error) {
          console.error(error.stack);
        }
        process.exit(1);
      }
    });

  // Extract command
  program
    .command('extract <text>')
    .description('Extract bank accounts, UPI ids, phone numbers and links from text')
    .option('--json', 'Output as JSON')
    .action((text: string, options: { json?: boolean }) => {
      const indicators = new IndicatorExtractor().extract(text);

      if (options.json) {
        console.log(JSON.stringify(indicators, null, 2));
        return;
      }

      for (const kind of INDICATOR_KINDS) {
        const values = indicators[kind];
        console.log(`${chalk.bold(kind.padEnd(14))} ${values.length > 0 ? chalk.cyan(values.join(', ')) : chalk.gray('none')}`);
      }
    });

  // Classify command
  program
    .command('classify <text>')
    .description('Score a message for scam intent (uses the LLM when a key is set)')
    .option('--json', 'Output as JSON')
    .action(async (text: string, options: { json?: boolean }) => {
      try {
        const config = ConfigManager.fromEnv().getConfig();
        const classifier = new ScamClassifier({
          provider: createProviderFromConfig(config.llm),
          threshold: config.detection.threshold,
          saturation: config.detection.keywordSaturation,
          timeoutMs: config.llm.timeoutMs,
        });
        const result = await classifier.classify(text);

        if (options.json) {
          console.log(JSON.stringify(result, null, 2));
          return;
        }

        const verdict = result.isScam ? chalk.red('SCAM') : chalk.green('NOT SCAM');
        console.log(`${verdict} ${chalk.gray(`(${result.confidence.toFixed(2)}, ${result.source})`)}`);
        console.log(result.reasoning);
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exit(1);
      }
    });

  // Exit-check command
  program
    .command('exit-check <text>')
    .description('Check whether a message would end the conversation')
    .action((text: string) => {
      console.log(isExitMessage(text) ? chalk.yellow('exit') : chalk.gray('continue'));
    });

  return program;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Main Entry Point
// ============================================================================

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createCLI();
  await program.parseAsync(argv);
}

export default main;
