import type { IncidentRunResult } from "../responder.js";

export interface CliArgs {
  errorLog?: string;
  file?: string;
  maxIterations?: number;
  quiet: boolean;
  /** Report path; `true` means a generated file name in the working directory. */
  output?: string | true;
  provider?: string;
  model?: string;
  autoApprove: boolean;
  resume?: string;
  approved?: boolean;
  explain: boolean;
  /** Menu of sample incidents; also used when no error log is given on a terminal. */
  interactive: boolean;
  help: boolean;
}

export const USAGE = `Usage: incident-responder [options]

Input (one of):
  --error <text>            Error log text
  --file <path>             Read the error log from a file
  (stdin)                   Piped error log
  --interactive, -i         Pick a sample incident or paste one, repeatedly
                            (default on a terminal without other input)

Options:
  --max-iterations <n>      Research passes, 1-10 (default from MAX_RESEARCH_ITERATIONS)
  --provider <name>         LLM provider (default from LLM_PROVIDER)
  --model <id>              LLM model (default from LLM_MODEL)
  --output [path]           Save a markdown report
  --explain                 Stream an explanation of the solution
  --auto-approve            Approve pending actions without asking
  --resume <runId>          Resume a suspended run; needs --approve or --reject
  --approve | --reject      Decision for --resume
  --quiet                   No progress output
  --help                    Show this text

Exit codes: 0 completed, 1 failed, 2 waiting for approval`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function valueAfter(argv: readonly string[], index: number, flag: string, what: string): string {
  const next = argv[index + 1];
  if (next === undefined || next.startsWith("--")) {
    throw new CliUsageError(`${flag} requires ${what}`);
  }
  return next;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { quiet: false, autoApprove: false, explain: false, interactive: false, help: false };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index] ?? "";
    switch (token) {
      case "--error":
        args.errorLog = valueAfter(argv, index, token, "the error text");
        index += 1;
        break;
      case "--file":
        args.file = valueAfter(argv, index, token, "a file path");
        index += 1;
        break;
      case "--max-iterations": {
        const raw = valueAfter(argv, index, token, "a number");
        const value = Number(raw);
        if (!Number.isInteger(value) || value < 1 || value > 10) {
          throw new CliUsageError(`--max-iterations must be an integer between 1 and 10; got ${raw}`);
        }
        args.maxIterations = value;
        index += 1;
        break;
      }
      case "--output": {
        const next = argv[index + 1];
        if (next === undefined || next.startsWith("--")) {
          args.output = true;
        } else {
          args.output = next;
          index += 1;
        }
        break;
      }
      case "--provider":
        args.provider = valueAfter(argv, index, token, "a provider name");
        index += 1;
        break;
      case "--model":
        args.model = valueAfter(argv, index, token, "a model id");
        index += 1;
        break;
      case "--resume":
        args.resume = valueAfter(argv, index, token, "a run id");
        index += 1;
        break;
      case "--approve":
      case "--reject": {
        const approved = token === "--approve";
        if (args.approved !== undefined && args.approved !== approved) {
          throw new CliUsageError("--approve and --reject are mutually exclusive");
        }
        args.approved = approved;
        break;
      }
      case "--auto-approve":
        args.autoApprove = true;
        break;
      case "--explain":
        args.explain = true;
        break;
      case "--quiet":
        args.quiet = true;
        break;
      case "--interactive":
      case "-i":
        args.interactive = true;
        break;
      case "--help":
      case "-h":
        args.help = true;
        break;
      default:
        throw new CliUsageError(`Unknown argument: ${token}`);
    }
  }

  if (args.help) {
    return args;
  }
  if (args.resume !== undefined) {
    if (args.approved === undefined) {
      throw new CliUsageError("--resume requires --approve or --reject");
    }
    if (args.errorLog !== undefined || args.file !== undefined) {
      throw new CliUsageError("--resume cannot be combined with --error or --file");
    }
  } else if (args.approved !== undefined) {
    throw new CliUsageError(`${args.approved ? "--approve" : "--reject"} is only valid with --resume`);
  }
  if (args.interactive && (args.errorLog !== undefined || args.file !== undefined || args.resume !== undefined)) {
    throw new CliUsageError("--interactive cannot be combined with --error, --file or --resume");
  }
  if (args.errorLog !== undefined && args.file !== undefined) {
    throw new CliUsageError("Use either --error or --file, not both");
  }
  return args;
}

export const EXIT_COMPLETED = 0;
export const EXIT_FAILED = 1;
export const EXIT_SUSPENDED = 2;

export function exitCodeFor(result: IncidentRunResult): number {
  switch (result.status) {
    case "completed":
      return EXIT_COMPLETED;
    case "suspended":
      return EXIT_SUSPENDED;
    case "failed":
      return EXIT_FAILED;
  }
}
