import { readFile, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { createInterface, type Interface } from "node:readline/promises";

import { errorMessage } from "@incident-responder/graph-engine";

import { FileCheckpointStore } from "../checkpoints/file-store.js";
import { credentialWarnings, responderConfigFromEnv } from "../config.js";
import { PiAiLanguageModel } from "../llm/language-model.js";
import { validateModelConfig } from "../llm/models.js";
import { createEventLogger, stderrLine } from "../logging.js";
import { renderReport, renderSummary, reportFileName } from "../report.js";
import { IncidentResponder, type IncidentRunResult } from "../responder.js";
import type { IncidentState } from "../state.js";
import { FileReader } from "../tools/file-reader.js";
import { TavilySearchClient } from "../tools/search.js";
import {
  CliUsageError,
  EXIT_COMPLETED,
  EXIT_FAILED,
  EXIT_SUSPENDED,
  USAGE,
  exitCodeFor,
  parseArgs,
  type CliArgs
} from "./args.js";
import { parseMenuChoice, renderMenu } from "./samples.js";

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function readErrorLog(args: CliArgs): Promise<string> {
  const text =
    args.errorLog ??
    (args.file !== undefined ? await readFile(resolve(args.file), "utf8") : await readStdin());
  if (!text.trim()) {
    throw new CliUsageError("No error log given; use --error, --file, --interactive or pipe it on stdin");
  }
  return text;
}

type SuspendedRun = Extract<IncidentRunResult, { status: "suspended" }>;

async function confirm(prompt: Interface, question: string, signal: AbortSignal): Promise<boolean> {
  for (;;) {
    const answer = (await prompt.question(question, { signal })).trim().toLowerCase();
    if (answer === "y" || answer === "yes") {
      return true;
    }
    if (answer === "n" || answer === "no") {
      return false;
    }
  }
}

async function askApproval(
  result: SuspendedRun,
  prompt: Interface | undefined,
  signal: AbortSignal
): Promise<boolean | null> {
  const question = `Approve the proposed action for run ${result.runId}? (y/n): `;
  if (prompt) {
    return confirm(prompt, question, signal);
  }
  if (!process.stdin.isTTY) {
    return null;
  }
  const oneShot = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await confirm(oneShot, question, signal);
  } finally {
    oneShot.close();
  }
}

function describePending(result: SuspendedRun): string {
  const { pending } = result;
  const lines = ["", "HUMAN APPROVAL REQUIRED", pending.description, "", result.state.proposedSolution || "(no solution text)"];
  const commands = pending.impact.commands;
  if (Array.isArray(commands) && commands.length > 0) {
    lines.push("", "Commands:", ...commands.map((command) => `  $ ${String(command)}`));
  }
  return `${lines.join("\n")}\n`;
}

async function finish(
  args: CliArgs,
  responder: IncidentResponder,
  state: IncidentState,
  signal: AbortSignal,
  prompt: Interface | undefined
): Promise<void> {
  process.stdout.write(renderSummary(state));
  const explain =
    args.explain ||
    (prompt !== undefined && (await confirm(prompt, "\nStream a detailed explanation? (y/n): ", signal)));
  if (explain) {
    process.stdout.write("\nEXPLANATION\n");
    for await (const chunk of responder.explainSolution(state, signal)) {
      process.stdout.write(chunk);
    }
    process.stdout.write("\n");
  }
  if (args.output !== undefined) {
    const path = resolve(args.output === true ? reportFileName(new Date()) : args.output);
    await writeFile(path, renderReport(state), "utf8");
    process.stdout.write(`Report saved to: ${path}\n`);
  }
}

/** Walks a run through its approvals and prints the outcome. */
async function settle(
  args: CliArgs,
  responder: IncidentResponder,
  first: IncidentRunResult,
  signal: AbortSignal,
  prompt?: Interface
): Promise<number> {
  let result = first;
  while (result.status === "suspended") {
    process.stdout.write(describePending(result));
    const approved = args.autoApprove ? true : await askApproval(result, prompt, signal);
    if (approved === null) {
      process.stdout.write(
        `Run ${result.runId} is waiting for approval.\n` +
          `Resume with: incident-responder --resume ${result.runId} --approve (or --reject)\n`
      );
      return EXIT_SUSPENDED;
    }
    result = await responder.resume(result.runId, { approved }, { signal });
  }

  if (result.status === "failed") {
    process.stderr.write(`Investigation failed at ${result.error.nodeName}: ${result.error.code}: ${result.error.message}\n`);
    return EXIT_FAILED;
  }

  await finish(args, responder, result.state, signal, prompt);
  return exitCodeFor(result);
}

async function readPasted(prompt: Interface, signal: AbortSignal): Promise<string> {
  process.stdout.write("\nPaste the error log, then an empty line:\n");
  const lines: string[] = [];
  for (;;) {
    const line = await prompt.question("", { signal });
    if (!line.trim()) {
      return lines.join("\n");
    }
    lines.push(line);
  }
}

async function interactive(
  args: CliArgs,
  responder: IncidentResponder,
  controller: AbortController
): Promise<number> {
  const { signal } = controller;
  const prompt = createInterface({ input: process.stdin, output: process.stdout });
  // A terminal in raw mode reports Ctrl-C to readline, not to the process.
  prompt.on("SIGINT", () => controller.abort(new Error("Interrupted")));
  let code = EXIT_COMPLETED;
  try {
    for (;;) {
      process.stdout.write(`\n${renderMenu()}\n`);
      const choice = parseMenuChoice(await prompt.question("Enter your choice: ", { signal }));
      if (choice.kind === "quit") {
        return code;
      }
      if (choice.kind === "invalid") {
        process.stdout.write(`Invalid choice "${choice.input}".\n`);
        continue;
      }

      let errorLog: string;
      if (choice.kind === "sample") {
        process.stdout.write(`\nInvestigating sample: ${choice.sample.name}\n`);
        errorLog = choice.sample.errorLog;
      } else {
        errorLog = await readPasted(prompt, signal);
      }
      if (!errorLog.trim()) {
        process.stdout.write("No error log given.\n");
        continue;
      }

      const result = await responder.investigate(errorLog, {
        ...(args.maxIterations !== undefined ? { maxIterations: args.maxIterations } : {}),
        signal
      });
      code = await settle(args, responder, result, signal, prompt);
      if (signal.aborted || !(await confirm(prompt, "\nInvestigate another incident? (y/n): ", signal))) {
        return code;
      }
    }
  } finally {
    prompt.close();
  }
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const config = responderConfigFromEnv(process.env);
  const modelConfig = {
    ...config.model,
    ...(args.provider ? { provider: args.provider } : {}),
    ...(args.model ? { modelId: args.model } : {})
  };
  for (const warning of credentialWarnings({ ...config, model: modelConfig }, process.env)) {
    process.stderr.write(`warning: ${warning}\n`);
  }

  const responder = new IncidentResponder({
    collaborators: {
      model: new PiAiLanguageModel(validateModelConfig(modelConfig)),
      search: new TavilySearchClient({ apiKey: config.tavilyApiKey }),
      files: new FileReader({ baseDir: config.workspaceDir }),
      ...(args.quiet ? {} : { log: (line: string) => stderrLine(`  ${line}\n`) })
    },
    policy: config.policy,
    store: new FileCheckpointStore(config.checkpointDir),
    nodeTimeoutMs: config.nodeTimeoutMs,
    ...(args.quiet ? {} : { onEvent: createEventLogger(stderrLine) })
  });

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort(new Error("Interrupted")));
  const { signal } = controller;

  const noInput = args.resume === undefined && args.errorLog === undefined && args.file === undefined;
  if (args.interactive || (noInput && process.stdin.isTTY)) {
    return interactive(args, responder, controller);
  }

  const first =
    args.resume !== undefined
      ? await responder.resume(args.resume, { approved: args.approved === true }, { signal })
      : await responder.investigate(await readErrorLog(args), {
          ...(args.maxIterations !== undefined ? { maxIterations: args.maxIterations } : {}),
          signal
        });
  return settle(args, responder, first, signal);
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    process.stderr.write(`${errorMessage(error)}\n`);
    if (error instanceof CliUsageError) {
      process.stderr.write(`\n${USAGE}\n`);
    }
    process.exit(EXIT_FAILED);
  });
