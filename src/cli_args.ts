export type Command = "detect" | "status" | "run" | "agent" | "help";

const COMMANDS: readonly Command[] = ["detect", "status", "run", "agent", "help"];

export interface CliArgs {
  command: Command;
  task: string;
  autoConfig: boolean;
  maxSteps?: number;
  configFile?: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = `Usage: chrome-pilot <command> [options] [task]

Commands:
  detect            Detect Chrome, save the configuration and print it
  status            Show the saved Chrome configuration
  run <task>        Run a keyword task ("open google", "search cats", a URL)
  agent <task>      Let the LLM agent work on a task
  help              Show this message

Options:
  --no-auto-config      Skip Chrome detection before run/agent
  --config-file <path>  Where the detection result is stored
  --max-steps <n>       Step cap for the agent`;

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { command: "help", task: "", autoConfig: true };
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--no-auto-config":
        args.autoConfig = false;
        break;
      case "--config-file": {
        const value = argv[++i];
        if (!value) throw new UsageError("--config-file needs a path");
        args.configFile = value;
        break;
      }
      case "--max-steps": {
        const value = Number(argv[++i]);
        if (!Number.isInteger(value) || value < 1) {
          throw new UsageError("--max-steps needs a positive integer");
        }
        args.maxSteps = value;
        break;
      }
      case "-h":
      case "--help":
        args.command = "help";
        return args;
      default:
        if (arg.startsWith("--")) throw new UsageError(`Unknown option: ${arg}`);
        words.push(arg);
    }
  }

  const [command, ...rest] = words;
  if (command === undefined) {
    return args;
  }
  if (!isCommand(command)) {
    throw new UsageError(`Unknown command: ${command}`);
  }

  args.command = command;
  args.task = rest.join(" ").trim();
  if ((command === "run" || command === "agent") && !args.task) {
    throw new UsageError(`${command} needs a task`);
  }
  return args;
}
