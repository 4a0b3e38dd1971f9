import inquirer from 'inquirer';
import { isErrorPayload, MainAgent } from '../agents/MainAgent';
import { parseAssumptions } from '../commands/whatIf';
import { renderPlanMarkdown } from '../planning/planRenderer';
import { dbg, errorMessage, newId, say } from '../utils';

const EXIT_COMMAND = 'exit';
const NEW_COMMAND = 'new';
const PLAN_COMMAND = 'plan';
const STEPS_COMMAND = 'steps';
const CONTINUE_COMMAND = 'continue';
const WHAT_IF_COMMAND = 'whatif';

const SHELL_PROMPT = 'planner> ';

/**
 * State of one interactive session: the conversation new input goes to.
 */
export interface ShellSession {
    conversationId: string;
}

/**
 * Prompts the user for command input in the interactive shell.
 *
 * @returns Promise that resolves to the trimmed command string entered by user
 */
export async function getCommandInput() : Promise<string>
{
    const answers = await inquirer.prompt<{ command: string }>([
        { type: 'input', name: 'command', message: SHELL_PROMPT }
    ]);
    return answers.command.trim();
}

/**
 * Parses a command line input string into a command and arguments.
 *
 * Handles quoted arguments by preserving spaces within quotes and removing the quotes.
 * For example: `whatif "demand drops" demand=-0.2` becomes:
 * - command: "whatif"
 * - args: ["demand drops", "demand=-0.2"]
 *
 * @param commandInput - The raw command line input string to parse
 * @returns An object containing:
 *   - command: The first word of input, converted to lowercase
 *   - args: Array of remaining arguments, with quotes stripped from quoted arguments
 */
export function parseCommand(commandInput: string) : {command: string, args: string[]}
{
    const parts = commandInput.match(/(?:[^\s"']+|"[^"]*"|'[^']*')+/g) || [];
    const command = parts[0]?.toLowerCase() || '';
    const args = parts.slice(1).map((arg: string) =>
        (arg.startsWith('"') && arg.endsWith('"')) || (arg.startsWith("'") && arg.endsWith("'"))
        ? arg.slice(1, -1)
        : arg
    );
    return { command, args };
}

async function handleQuery(agent: MainAgent, session: ShellSession, query: string, continueReasoning: boolean) {
    const response = await agent.processQuery(query, session.conversationId, continueReasoning);
    if (isErrorPayload(response)) {
        say(`Planner error (${response.error_kind}): ${response.error}`);
        return;
    }
    say(response.plan_markdown);
}

async function handleWhatIf(agent: MainAgent, session: ShellSession, args: string[]) {
    const [scenario, ...assumptionArgs] = args;
    if (!scenario) {
        say('Usage: whatif "<scenario>" [key=value ...]');
        return;
    }
    const response = await agent.whatIfAnalysis(session.conversationId, scenario, parseAssumptions(assumptionArgs));
    if (isErrorPayload(response)) {
        say(`Planner error (${response.error_kind}): ${response.error}`);
        return;
    }
    say(response.plan_markdown);
}

function showPlan(agent: MainAgent, session: ShellSession) {
    const record = agent.store.get(session.conversationId);
    if (!record?.plan) {
        say('No plan yet. Ask a question first.');
        return;
    }
    say(renderPlanMarkdown(record.plan));
}

function showSteps(agent: MainAgent, session: ShellSession) {
    const steps = agent.store.get(session.conversationId)?.chain.getSteps() ?? [];
    if (steps.length === 0) {
        say('No reasoning steps yet.');
        return;
    }
    steps.forEach((step, index) => {
        say(`${index + 1}. Observation: ${step.observation}`);
        say(`   Thought: ${step.thought}`);
        if (step.action) say(`   Action: ${step.action}`);
        if (step.result) say(`   Result: ${step.result}`);
    });
}

/**
 * Executes one line of shell input.
 * @returns false when the shell should stop.
 */
export async function handleShellInput(agent: MainAgent, session: ShellSession, commandInput: string): Promise<boolean> {
    const { command, args } = parseCommand(commandInput);
    try {
        switch (command)
        {
            case '':
                break;
            case EXIT_COMMAND:
                say('Exiting planner...');
                return false;
            case NEW_COMMAND:
                session.conversationId = newId();
                say(`Started conversation ${session.conversationId}`);
                break;
            case PLAN_COMMAND:
                showPlan(agent, session);
                break;
            case STEPS_COMMAND:
                showSteps(agent, session);
                break;
            case CONTINUE_COMMAND:
                await handleQuery(agent, session, args.join(' '), true);
                break;
            case WHAT_IF_COMMAND:
                await handleWhatIf(agent, session, args);
                break;
            default:
                // Anything else is a planning query in the current conversation
                await handleQuery(agent, session, commandInput, false);
                break;
        }
    } catch (error) {
        say(`Error: ${errorMessage(error)}`);
    }
    return true;
}

/**
 * Starts an interactive planning session. Saving the store is left to the caller.
 *
 * @param readInput - Source of input lines; defaults to the inquirer prompt
 */
export async function startShell(
    agent: MainAgent,
    conversationId: string = newId(),
    readInput: () => Promise<string> = getCommandInput
) {
  const session: ShellSession = { conversationId };
  say('Starting interactive planner. Type "exit" to quit.');
  say('Commands: new, plan, steps, continue <query>, whatif "<scenario>" [key=value ...], exit; anything else is a planning query.');
  dbg(`Shell conversation: ${session.conversationId}`);

  let shellRunning = true;
  while (shellRunning) {
    const commandInput = await readInput();
    shellRunning = await handleShellInput(agent, session, commandInput);
  }
}
