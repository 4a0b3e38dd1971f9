#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { APP_VERSION, DEFAULT_HOST, DEFAULT_MAX_CONVERSATIONS, DEFAULT_MEMORY_WINDOW, DEFAULT_PORT, DEFAULT_STORE_FILE_PATH } from './config';
import { MainAgent } from './agents/MainAgent';
import { ConversationStore } from './memory/ConversationStore';
import { LruEvictionPolicy } from './memory/EvictionPolicy';
import { PromptService } from './services/PromptService';
import { runAsk } from './commands/ask';
import { parseAssumptions, runWhatIf } from './commands/whatIf';
import { runServe } from './commands/serve';
import { startShell } from './cli/shell';
import { dbg, say } from './utils';

const GENERAL_ERROR = 1;
const ASK_ERROR = 3;
const COMMAND_PARSING_ERROR = 4;
const UNHANDLED_ERROR = 5;

// Load environment variables from .env file
dotenv.config();

interface GlobalOptions {
  model?: string;
  storeFile: string;
  promptsConfig?: string;
  memoryWindow: number;
  maxConversations: number;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parsePort(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
    throw new InvalidArgumentError('Expected a port number between 0 and 65535.');
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

/**
 * Builds the agent from the global options and loads the persisted conversations.
 */
async function createAgent(globalOptions: GlobalOptions): Promise<MainAgent> {
  const storeFilePath = path.resolve(globalOptions.storeFile);
  dbg(`Using store file: ${storeFilePath}`);
  say(`Using model: ${globalOptions.model ?? 'provider default'}`);
  if (globalOptions.promptsConfig) {
    dbg(`Using prompts configuration file: ${path.resolve(globalOptions.promptsConfig)}`);
  }

  const store = new ConversationStore({
    memoryWindow: globalOptions.memoryWindow,
    evictionPolicy: new LruEvictionPolicy(globalOptions.maxConversations),
  });
  await store.loadStore(storeFilePath);

  return new MainAgent({
    store,
    promptService: new PromptService(globalOptions.promptsConfig),
    modelName: globalOptions.model,
  });
}

async function main() {
  const program = new Command();

  // --- Global Options ---
  program
    .name('business-planner')
    .version(APP_VERSION)
    .description('Business Planner - ReAct planning assistant (CLI and HTTP)')
    .option('-m, --model <model_name>', 'Global AI model to use')
    .option('--store-file <path>', 'Path to the conversation store file', DEFAULT_STORE_FILE_PATH)
    .option('--prompts-config <path>', 'Path to a JSON file for custom prompt configurations')
    .option('--memory-window <exchanges>', 'Chat exchanges replayed into each model request', parsePositiveInt, DEFAULT_MEMORY_WINDOW)
    .option('--max-conversations <count>', 'Conversations kept before the least recently used is dropped', parsePositiveInt, DEFAULT_MAX_CONVERSATIONS);

  say("Business Planner Starting...");

  // --- Define Commands ---

  program
    .command('serve')
    .description('Serve the planner over HTTP')
    .option('-p, --port <port>', 'Port to listen on', parsePort, DEFAULT_PORT)
    .option('--host <host>', 'Host to bind', DEFAULT_HOST)
    .action(async (options: { port: number; host: string }) => {
      const agent = await createAgent(program.opts<GlobalOptions>());
      // Conversations are saved on shutdown
      await runServe(agent, { host: options.host, port: options.port });
    });

  program
    .command('ask')
    .description('Send a planning query')
    .argument('<input...>', 'The question for the planner')
    .option('-c, --conversation <id>', 'Continue an existing conversation')
    .option('--continue', 'Feed the conversation\'s reasoning so far back to the model')
    .option('-o, --output <directory>', 'Directory to save the rendered plan to')
    .action(async (inputParts: string[], options: { conversation?: string; continue?: boolean; output?: string }) => {
      const inputText = inputParts.join(' ');
      const agent = await createAgent(program.opts<GlobalOptions>());
      try {
        dbg(`Sending to planner: "${inputText}"`);
        await runAsk(inputText, agent, {
          conversationId: options.conversation,
          continueReasoning: options.continue ?? false,
          outputDir: options.output,
        });
        await agent.store.saveStore();
        dbg("Ask command finished successfully.");
      } catch (error) {
        dbg(`Ask command failed: ${error}`);
        await agent.store.saveStore();
        process.exit(ASK_ERROR);
      }
    });

  program
    .command('what-if')
    .description('Analyze a what-if scenario against a conversation\'s current plan')
    .requiredOption('-c, --conversation <id>', 'Conversation whose plan is analyzed')
    .requiredOption('-s, --scenario <description>', 'The scenario to analyze')
    .option('-a, --assume <key=value>', 'An assumption of the scenario (repeatable)', collect, [])
    .option('-o, --output <directory>', 'Directory to save the rendered plan to')
    .action(async (options: { conversation: string; scenario: string; assume: string[]; output?: string }) => {
      const agent = await createAgent(program.opts<GlobalOptions>());
      try {
        await runWhatIf(agent, options.conversation, options.scenario, parseAssumptions(options.assume), options.output);
        await agent.store.saveStore();
        dbg("What-if command finished successfully.");
      } catch (error) {
        dbg(`What-if command failed: ${error}`);
        await agent.store.saveStore();
        process.exit(GENERAL_ERROR);
      }
    });

  program
    .command('chat')
    .description('Start an interactive planning session')
    .option('-c, --conversation <id>', 'Resume an existing conversation')
    .action(async (options: { conversation?: string }) => {
      const agent = await createAgent(program.opts<GlobalOptions>());
      await startShell(agent, options.conversation);
      say('Saving conversations before exiting...');
      await agent.store.saveStore();
    });

  // --- Parse and Execute ---
  if (process.argv.length <= 2) {
    program.help();
  }
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    dbg(`Error during command parsing or execution: ${error}`);
    process.exit(COMMAND_PARSING_ERROR);
  }
}

main().catch(error => {
  dbg(`Unhandled application error: ${error}`);
  process.exit(UNHANDLED_ERROR);
});
