#!/usr/bin/env node
/**
 * Focus Chat CLI
 *
 * Interactive chat with the task assistant, plus inspection commands for the
 * tool set and the capability ladder.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as readline from 'readline';
import { createDefaultServices, createFocusApp, type FocusApp } from './app.js';
import { getDefaultModelId } from './backends/llm-provider.js';
import { CloudConfigSchema, loadConfig, type Config } from './config.js';
import type { Message } from './conversation/message.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { formatMetricsSummary } from './observability/metrics.js';
import { DEFAULT_LADDER, isTextOnly, loadLadderFile } from './orchestrator/degradation.js';
import type { OrchestratorEvent, TurnResult } from './orchestrator/orchestrator.js';
import type { RefinementReport } from './orchestrator/refiner.js';
import { registerBuiltinTools } from './tools/builtin/index.js';
import { ToolRegistry } from './tools/registry.js';

interface ChatOptions {
  provider?: string;
  model?: string;
  history?: string;
  verbose?: boolean;
}

const program = new Command();

program
  .name('focus-chat')
  .description('ADHD task assistant with tool calling and backend fallback')
  .version('1.0.0');

program
  .command('chat', { isDefault: true })
  .description('Start an interactive chat')
  .option('-p, --provider <provider>', 'Cloud provider (openrouter or anthropic)')
  .option('-m, --model <model>', 'Cloud model ID to use')
  .option('--history <file>', 'Conversation history file')
  .option('-v, --verbose', 'Show tool calls, tier changes and debug logs')
  .action(async (options: ChatOptions) => {
    await runChatMode(options);
  });

program
  .command('tools')
  .description('List the built-in tools')
  .option('-v, --verbose', 'Show parameter schemas')
  .action((options: { verbose?: boolean }) => {
    listTools(options.verbose ?? false);
  });

program
  .command('ladder')
  .description('Show the capability ladder walked when a backend fails')
  .action(async () => {
    await showLadder();
  });

// =============================================================================
// Configuration
// =============================================================================

function applyChatOptions(config: Config, options: ChatOptions): Config {
  const provider = CloudConfigSchema.shape.provider.safeParse(options.provider ?? config.cloud.provider);
  if (!provider.success) {
    throw new ConfigurationError(`Unknown provider: ${options.provider ?? ''}`);
  }

  return {
    ...config,
    logLevel: options.verbose ? 'debug' : config.logLevel,
    historyFile: options.history ?? config.historyFile,
    cloud: {
      ...config.cloud,
      provider: provider.data,
      ...(options.model ? { model: options.model } : {}),
    },
  };
}

// =============================================================================
// Chat
// =============================================================================

function printEvent(event: OrchestratorEvent): void {
  switch (event.type) {
    case 'send':
      console.log(chalk.gray(`[${event.tier}] thinking...`));
      break;
    case 'degraded':
      console.log(chalk.yellow(`[${event.from}] ${event.reason}, falling back to ${event.to}`));
      break;
    case 'tool_result':
      console.log(
        event.isError
          ? chalk.red(`[Tool] ${event.tool} failed (${event.durationMs}ms)`)
          : chalk.magenta(`[Tool] ${event.tool} (${event.durationMs}ms)`)
      );
      break;
  }
}

function printResult(result: TurnResult): void {
  switch (result.kind) {
    case 'success':
      console.log(chalk.green(`\nAssistant: ${result.text}\n`));
      break;
    case 'failure':
      console.log(chalk.red(`\n${result.message}\n`));
      break;
    case 'cancelled':
      console.log(chalk.yellow('\nCancelled. Nothing from that message was saved.\n'));
      break;
  }
}

function printMessage(message: Message): void {
  switch (message.role) {
    case 'system':
      break;
    case 'user':
      console.log(chalk.cyan(`You: ${message.content}`));
      break;
    case 'assistant':
      if (message.toolCalls && message.toolCalls.length > 0) {
        for (const call of message.toolCalls) {
          console.log(chalk.magenta(`  → ${call.name} ${call.argumentsJSON}`));
        }
      }
      if (message.content) {
        console.log(chalk.green(`Assistant: ${message.content}`));
      }
      break;
    case 'tool':
      console.log(chalk.gray(`  ← ${message.name}: ${message.content.split('\n')[0] ?? ''}`));
      break;
  }
}

function printRefinement(report: RefinementReport): void {
  switch (report.status) {
    case 'nothing_to_refine':
      console.log(chalk.gray('Every open task already has its details.'));
      return;
    case 'failed':
      console.log(chalk.red(`Refinement failed: ${report.failure?.message ?? 'no backend answered'}`));
      break;
    case 'round_limit':
      console.log(chalk.yellow('Refinement stopped after too many tool rounds.'));
      break;
    case 'cancelled':
      console.log(chalk.yellow('Refinement cancelled.'));
      break;
    case 'completed':
      break;
  }
  for (const line of report.applied) {
    console.log(chalk.gray(`  ${line}`));
  }
  if (report.summary) {
    console.log(chalk.green(`Assistant: ${report.summary}`));
  }
}

async function runChatMode(options: ChatOptions): Promise<void> {
  let app: FocusApp;
  try {
    const config = applyChatOptions(loadConfig(), options);
    app = await createFocusApp({
      config,
      onEvent: options.verbose ? printEvent : undefined,
    });
  } catch (error) {
    console.error(chalk.red(`Failed to start: ${errorMessage(error)}`));
    process.exit(1);
  }

  const { orchestrator, refiner, store, registry, config, metrics } = app;
  console.log(chalk.blue(`Cloud model: ${config.cloud.model ?? getDefaultModelId(config.cloud.provider)}`));
  console.log(chalk.blue(`Local model: ${config.onDevice.model} at ${config.onDevice.baseURL}`));
  console.log(chalk.blue(`History: ${config.historyFile} (${store.size() - 1} messages)`));

  console.log(chalk.yellow('\nChat mode started. Type your messages, or:'));
  console.log(chalk.gray('  /tools    - List available tools'));
  console.log(chalk.gray('  /history  - Show the conversation so far'));
  console.log(chalk.gray('  /clear    - Clear conversation history'));
  console.log(chalk.gray('  /stats    - Show turn, send and tool counts for this session'));
  console.log(chalk.gray('  /refine   - Fill in missing task durations, difficulties and categories'));
  console.log(chalk.gray('  /exit     - Exit'));
  console.log(chalk.gray('  Ctrl+C cancels a reply in progress'));
  console.log();

  if (config.refineIntervalMinutes > 0) {
    refiner.schedule(config.refineIntervalMinutes * 60000);
  }

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  rl.on('SIGINT', () => {
    if (orchestrator.isBusy()) {
      orchestrator.cancel();
      return;
    }
    rl.close();
  });

  rl.on('close', () => {
    console.log(chalk.yellow('Goodbye!'));
    process.exit(0);
  });

  const handleCommand = async (cmd: string): Promise<void> => {
    switch (cmd) {
      case '/quit':
      case '/exit':
      case '/q':
        rl.close();
        return;
      case '/tools':
        console.log(chalk.green('\nAvailable tools:'));
        for (const tool of registry.definitions()) {
          console.log(chalk.white(`  ${tool.name}`));
          console.log(chalk.gray(`    ${tool.description}`));
        }
        console.log();
        return;
      case '/history':
        console.log();
        for (const message of store.fullHistory()) {
          printMessage(message);
        }
        console.log();
        return;
      case '/stats':
        console.log();
        for (const line of formatMetricsSummary(metrics.getMetrics())) {
          console.log(chalk.white(`  ${line}`));
        }
        console.log();
        return;
      case '/refine': {
        const report = await refiner.refineTasks();
        printRefinement(report);
        return;
      }
      case '/clear':
        await orchestrator.clearHistory();
        console.log(chalk.yellow('Conversation history cleared.'));
        return;
      default:
        console.log(chalk.red(`Unknown command: ${cmd}`));
    }
  };

  const handleInput = async (input: string): Promise<void> => {
    const trimmed = input.trim();
    if (!trimmed) {
      return;
    }

    try {
      if (trimmed.startsWith('/')) {
        await handleCommand(trimmed.toLowerCase());
        return;
      }
      printResult(await orchestrator.send(trimmed));
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
    }
  };

  const prompt = (): void => {
    rl.question(chalk.cyan('You: '), (input) => {
      void handleInput(input).then(prompt);
    });
  };

  prompt();
}

// =============================================================================
// Inspection
// =============================================================================

function listTools(verbose: boolean): void {
  const registry = new ToolRegistry();
  registerBuiltinTools(registry, createDefaultServices());

  const tools = registry.definitions();
  console.log(chalk.green(`\nFound ${tools.length} tools:\n`));
  for (const tool of tools) {
    console.log(chalk.white(tool.name));
    console.log(chalk.gray(`  ${tool.description}`));
    if (verbose) {
      console.log(chalk.gray(`  Parameters: ${JSON.stringify(tool.parameterSchema, null, 2)}`));
    }
    console.log();
  }
}

async function showLadder(): Promise<void> {
  const config = loadConfig();
  const ladder = config.ladderFile ? await loadLadderFile(config.ladderFile) : DEFAULT_LADDER;

  console.log(chalk.blue(`\nCapability ladder${config.ladderFile ? ` (${config.ladderFile})` : ''}:\n`));
  ladder.forEach((tier, index) => {
    const tools = tier.toolSubset === 'all' ? 'all tools' : isTextOnly(tier) ? 'text only' : `${tier.toolSubset.length} tools`;
    console.log(chalk.white(`  ${index + 1}. ${tier.label}`) + chalk.gray(`  backend=${tier.backendId}, ${tools}`));
  });
  console.log();
}

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exit(1);
});
