/**
 * Command line program
 *
 * chat, ask, tools, call, cleanup and info. Logs go to stderr; answers and
 * results go to stdout.
 */

import { randomUUID } from 'node:crypto';
import * as readline from 'node:readline';
import chalk from 'chalk';
import { Command } from 'commander';
import { getAvailableProviders, getDefaultModelId } from '../agent/llm-provider.js';
import { sweepExpiredArtifacts } from '../artifacts/cleanup.js';
import { LlmProviderSchema, loadConfig, type Config } from '../config.js';
import { describeError } from '../errors.js';
import { createAgentRuntime, createToolRuntime, type AgentRuntime } from '../runtime.js';
import { zodToJsonSchema } from '../tools/registry.js';
import {
  describeMessage,
  describeThread,
  parseReplInput,
  parseToolArguments,
  printOutcome,
} from './format.js';

const VERSION = '0.1.0';

interface ModelOptions {
  provider?: string;
  model?: string;
}

interface ChatOptions extends ModelOptions {
  thread?: string;
  verbose?: boolean;
}

interface AskOptions extends ModelOptions {
  thread?: string;
  json?: boolean;
  verbose?: boolean;
}

export function newThreadId(): string {
  return `cli-${randomUUID().slice(0, 8)}`;
}

/**
 * Environment configuration with command line overrides applied
 */
export function resolveConfig(options: ModelOptions, env: NodeJS.ProcessEnv = process.env): Config {
  const config = loadConfig(env);
  return {
    ...config,
    llm: {
      provider: options.provider !== undefined ? LlmProviderSchema.parse(options.provider) : config.llm.provider,
      model: options.model ?? config.llm.model,
    },
  };
}

/**
 * Report a failed command and set a failing exit code
 */
function fail(error: unknown): void {
  console.error(chalk.red(`Error: ${describeError(error)}`));
  process.exitCode = 1;
}

// =============================================================================
// chat
// =============================================================================

interface ChatState {
  threadId: string;
  verbose: boolean;
  /** Controller of the turn in flight, if any */
  active: AbortController | undefined;
}

async function handleReplLine(runtime: AgentRuntime, line: string, state: ChatState): Promise<'continue' | 'quit'> {
  const input = parseReplInput(line);
  if (!input) {
    return 'continue';
  }

  switch (input.type) {
    case 'quit':
      return 'quit';
    case 'tools':
      console.log(chalk.green('\nAvailable tools:'));
      for (const tool of runtime.registry.catalog()) {
        console.log(chalk.white(`  ${tool.name}`) + chalk.gray(` (${tool.sideEffect})`));
        console.log(chalk.gray(`    ${tool.description}`));
      }
      console.log();
      return 'continue';
    case 'history': {
      const history = await runtime.agent.getHistory(state.threadId);
      console.log(chalk.green(`\nThread ${state.threadId}: ${history.length} messages`));
      for (const message of history) {
        console.log(chalk.gray(`  ${describeMessage(message)}`));
      }
      console.log();
      return 'continue';
    }
    case 'threads': {
      const threads = await runtime.memory.listThreads();
      console.log(chalk.green(`\n${threads.length} threads:`));
      for (const thread of threads) {
        const marker = thread.id === state.threadId ? '*' : ' ';
        console.log(chalk.gray(` ${marker} ${describeThread(thread)}`));
      }
      console.log();
      return 'continue';
    }
    case 'new':
      state.threadId = input.threadId ?? newThreadId();
      console.log(chalk.yellow(`Switched to thread ${state.threadId}`));
      return 'continue';
    case 'unknown':
      console.log(chalk.red(`Unknown command: ${input.command}`));
      return 'continue';
    case 'message': {
      state.active = new AbortController();
      console.log(chalk.gray('Thinking... (Ctrl-C cancels)'));
      try {
        const outcome = await runtime.agent.runTurn(state.threadId, input.text, { signal: state.active.signal });
        printOutcome(outcome, state.verbose);
      } finally {
        state.active = undefined;
      }
      return 'continue';
    }
  }
}

async function runChat(options: ChatOptions): Promise<void> {
  const runtime = await createAgentRuntime(resolveConfig(options));
  const state: ChatState = {
    threadId: options.thread ?? newThreadId(),
    verbose: options.verbose ?? false,
    active: undefined,
  };

  const modelId = runtime.config.llm.model ?? getDefaultModelId(runtime.config.llm.provider);
  console.log(chalk.blue(`Model: ${runtime.config.llm.provider}/${modelId}`));
  console.log(chalk.blue(`Thread: ${state.threadId}`));
  console.log(chalk.yellow('\nChat mode started. Type your questions, or:'));
  console.log(chalk.gray('  /tools      - List available tools'));
  console.log(chalk.gray('  /history    - Show this thread'));
  console.log(chalk.gray('  /threads    - List threads'));
  console.log(chalk.gray('  /new [id]   - Start or switch thread'));
  console.log(chalk.gray('  /quit       - Exit'));
  console.log();

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.on('SIGINT', () => {
    if (state.active) {
      state.active.abort();
      console.log(chalk.yellow('\nCancelling after the current step...'));
    } else {
      rl.close();
    }
  });

  rl.setPrompt(chalk.cyan('You: '));
  rl.prompt();
  try {
    for await (const line of rl) {
      try {
        if ((await handleReplLine(runtime, line, state)) === 'quit') {
          break;
        }
      } catch (error) {
        console.error(chalk.red(`Error: ${describeError(error)}`));
      }
      rl.prompt();
    }
  } finally {
    rl.close();
    await runtime.close();
    console.log(chalk.yellow('Goodbye!'));
  }
}

// =============================================================================
// ask / tools / call / cleanup / info
// =============================================================================

async function runAsk(words: string[], options: AskOptions): Promise<void> {
  const runtime = await createAgentRuntime(resolveConfig(options), { startSweeper: false });
  try {
    const outcome = await runtime.agent.runTurn(options.thread ?? newThreadId(), words.join(' '));
    if (options.json) {
      console.log(JSON.stringify(outcome, null, 2));
    } else {
      printOutcome(outcome, options.verbose ?? false);
    }
    if (outcome.status === 'storage_error' || outcome.status === 'reasoning_error') {
      process.exitCode = 1;
    }
  } finally {
    await runtime.close();
  }
}

async function listTools(options: { verbose?: boolean }): Promise<void> {
  const runtime = await createToolRuntime(loadConfig(), { startSweeper: false });
  try {
    const catalog = runtime.registry.catalog();
    console.log(chalk.green(`\nFound ${catalog.length} tools:\n`));
    for (const tool of catalog) {
      console.log(chalk.white(tool.name) + chalk.gray(` (${tool.sideEffect})`));
      console.log(chalk.gray(`  ${tool.description}`));
      if (options.verbose) {
        console.log(chalk.gray(`  Parameters: ${JSON.stringify(zodToJsonSchema(tool.inputSchema), null, 2)}`));
      }
      console.log();
    }
  } finally {
    await runtime.close();
  }
}

async function callTool(toolName: string, argsJson: string | undefined): Promise<void> {
  const args = parseToolArguments(argsJson);
  const runtime = await createToolRuntime(loadConfig(), { startSweeper: false });
  try {
    console.log(chalk.blue(`Calling tool: ${toolName}`));
    const result = await runtime.executor.execute({ id: `cli_${randomUUID()}`, name: toolName, arguments: args });
    if (result.status === 'success') {
      console.log(chalk.green('Result:'));
    } else {
      console.error(chalk.red(`Tool returned ${result.status}:`));
      process.exitCode = 1;
    }
    console.log(JSON.stringify(result, null, 2));
  } finally {
    await runtime.close();
  }
}

async function cleanup(): Promise<void> {
  const config = loadConfig();
  const result = await sweepExpiredArtifacts({
    directory: config.exportDir,
    ttlMs: config.artifactTtlMs,
    now: new Date(),
  });
  console.log(chalk.green(`Removed ${result.removed.length} expired files, kept ${result.kept}.`));
  for (const file of result.removed) {
    console.log(chalk.gray(`  ${file}`));
  }
}

function showInfo(): void {
  const config = loadConfig();
  const providers = getAvailableProviders();

  console.log(chalk.blue('\ndbchat information\n'));

  console.log(chalk.white('Providers:'));
  console.log(chalk.green(`  openrouter: ${providers.openrouter ? 'available' : 'not available (set OPENROUTER_API_KEY)'}`));
  console.log(chalk.green(`  anthropic: ${providers.anthropic ? 'available' : 'not available (set ANTHROPIC_API_KEY)'}`));

  console.log(chalk.white('\nDefault Models:'));
  console.log(chalk.gray(`  openrouter: ${getDefaultModelId('openrouter')}`));
  console.log(chalk.gray(`  anthropic: ${getDefaultModelId('anthropic')}`));

  console.log(chalk.white('\nConfiguration:'));
  console.log(chalk.gray(`  database:   ${config.databaseUrl ? 'configured' : 'not configured (set DBCHAT_DATABASE_URL)'}`));
  console.log(chalk.gray(`  memory:     ${config.memoryBackend}${config.memoryBackend === 'file' ? ` (${config.memoryDir})` : ''}`));
  console.log(chalk.gray(`  exports:    ${config.exportDir} (ttl ${config.artifactTtlMs}ms)`));
  console.log(chalk.gray(`  max steps:  ${config.maxSteps}`));
  console.log(chalk.gray(`  history:    ${config.historyMaxMessages} messages`));

  console.log(chalk.white('\nExamples:'));
  console.log(chalk.cyan('  dbchat chat --thread sales'));
  console.log(chalk.cyan('  dbchat ask "How many orders were placed last month?"'));
  console.log(chalk.cyan('  dbchat call sql_db_query \'{"query":"SELECT 1"}\''));
  console.log();
}

// =============================================================================
// Program
// =============================================================================

export function createProgram(): Command {
  const program = new Command();

  program.name('dbchat').description('Chat with a SQL database in natural language').version(VERSION);

  program
    .command('chat')
    .description('Start an interactive conversation')
    .option('-t, --thread <id>', 'Thread to continue (default: a new thread)')
    .option('-p, --provider <provider>', 'LLM provider (openrouter or anthropic)')
    .option('-m, --model <model>', 'Model ID to use')
    .option('-v, --verbose', 'Show tool steps and states')
    .action(async (options: ChatOptions) => {
      await runChat(options).catch(fail);
    });

  program
    .command('ask <question...>')
    .description('Ask a single question and print the answer')
    .option('-t, --thread <id>', 'Thread to continue (default: a new thread)')
    .option('-p, --provider <provider>', 'LLM provider (openrouter or anthropic)')
    .option('-m, --model <model>', 'Model ID to use')
    .option('--json', 'Print the full turn outcome as JSON')
    .option('-v, --verbose', 'Show tool steps and states')
    .action(async (question: string[], options: AskOptions) => {
      await runAsk(question, options).catch(fail);
    });

  program
    .command('tools')
    .description('List the registered tools')
    .option('-v, --verbose', 'Show parameter schemas')
    .action(async (options: { verbose?: boolean }) => {
      await listTools(options).catch(fail);
    });

  program
    .command('call <tool> [args]')
    .description('Call a tool directly with JSON arguments')
    .action(async (tool: string, args: string | undefined) => {
      await callTool(tool, args).catch(fail);
    });

  program
    .command('cleanup')
    .description('Delete exported files older than the artifact TTL')
    .action(async () => {
      await cleanup().catch(fail);
    });

  program
    .command('info')
    .description('Show providers and configuration')
    .action(() => {
      try {
        showInfo();
      } catch (error) {
        fail(error);
      }
    });

  return program;
}
