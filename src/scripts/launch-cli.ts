import "dotenv/config";
import process from "node:process";
import { pathToFileURL } from "node:url";
import { ConfigError } from "../lib/errors.js";
import { AppConfig, loadConfig } from "../lib/config.js";
import { logError, serializeError } from "../lib/logging.js";
import { createRuntime } from "../runtime.js";
import { appKinds, getAppKindProfile } from "../templates/catalog.js";
import { DeploymentContext, GenerationRequest } from "../types.js";
import { LaunchResult, LaunchWorkflow } from "../workflow/launch-workflow.js";
import { launchPhaseGraph, renderMermaid } from "../workflow/lifecycle-graph.js";

type CliCommand = "generate" | "launch" | "materials" | "phases" | "help";

interface ParsedArgs {
  command: CliCommand;
  args: string[];
  options: Record<string, string | boolean>;
}

export interface CliOutput {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const knownCommands: CliCommand[] = ["generate", "launch", "materials", "phases", "help"];
const booleanOptions = new Set(["pitch-deck", "document"]);

export function parseArgs(argv: string[]): ParsedArgs {
  const command = knownCommands.find((candidate) => candidate === argv[0]) ?? "help";
  const options: Record<string, string | boolean> = {};
  const args: string[] = [];

  for (let index = 1; index < argv.length; index += 1) {
    const token = argv[index] ?? "";

    if (!token.startsWith("-")) {
      args.push(token);
      continue;
    }

    if (token.startsWith("--")) {
      const eqIndex = token.indexOf("=");
      if (eqIndex > 2) {
        options[token.slice(2, eqIndex)] = token.slice(eqIndex + 1);
        continue;
      }

      const key = token.slice(2);
      const next = argv[index + 1];

      if (!booleanOptions.has(key) && next && !next.startsWith("-")) {
        options[key] = next;
        index += 1;
      } else {
        options[key] = true;
      }
    }
  }

  return { command, args, options };
}

function optionString(options: Record<string, string | boolean>, key: string): string | undefined {
  const value = options[key];
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  return undefined;
}

function optionFlag(options: Record<string, string | boolean>, key: string): boolean {
  const value = options[key];
  if (value === true) {
    return true;
  }

  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    return normalized === "true" || normalized === "1" || normalized === "yes" || normalized === "on";
  }

  return false;
}

export function commandUsage(): string {
  return [
    "idea2deploy CLI",
    "",
    "Commands:",
    "  generate --idea <text> [--kind streamlit|gradio|flask] [--repo <name>] [--pitch-deck] [--document]",
    "  launch --idea <text> [--kind streamlit|gradio|flask] [--repo <name>] [--pitch-deck] [--document]",
    "  materials <uniqueId>",
    "  phases                  print the launch phase graph as a Mermaid state diagram",
    "  help",
    "",
    "Notes:",
    "  - The idea may also be given as trailing words instead of --idea.",
    "  - launch generates, publishes and deploys in one go, then asks for materials when a flag is set.",
    "  - Configuration is read from the environment and an optional .env file."
  ].join("\n");
}

export function buildRequest(parsed: ParsedArgs): GenerationRequest {
  const idea = optionString(parsed.options, "idea") ?? parsed.args.join(" ").trim();
  if (!idea) {
    throw new Error('An app idea is required. Pass --idea "<text>".');
  }

  const rawKind = optionString(parsed.options, "kind") ?? "streamlit";
  const kind = appKinds.find((candidate) => candidate === rawKind.toLowerCase());
  if (!kind) {
    throw new Error(`Unknown --kind '${rawKind}'. Use one of: ${appKinds.join(", ")}.`);
  }

  return {
    idea,
    kind,
    repoName: optionString(parsed.options, "repo"),
    pitchDeck: optionFlag(parsed.options, "pitch-deck"),
    document: optionFlag(parsed.options, "document")
  };
}

function writeFailure(output: CliOutput, result: Extract<LaunchResult, { ok: false }>): number {
  output.stderr(`${result.error.kind} error: ${result.error.message}\n`);
  if (result.context.uniqueId) {
    output.stderr(`uniqueId=${result.context.uniqueId}\n`);
  }
  return 1;
}

function writeDeployment(output: CliOutput, context: DeploymentContext): void {
  const lines = [
    `uniqueId=${context.uniqueId ?? ""}`,
    `repo=${context.repository?.fullName ?? ""}`,
    `repoUrl=${context.repository?.htmlUrl ?? ""}`,
    `appName=${context.deployment?.application.name ?? ""}`,
    `appUrl=${context.deployment?.application.url ?? ""}`,
    `outcome=${context.deployment?.outcome ?? ""}`
  ];
  output.stdout(`${lines.join("\n")}\n`);
}

async function handleGenerate(workflow: LaunchWorkflow, parsed: ParsedArgs, output: CliOutput): Promise<number> {
  const request = buildRequest(parsed);
  const result = await workflow.generate(request);
  if (!result.ok) {
    return writeFailure(output, result);
  }

  const entryFile = getAppKindProfile(request.kind).entryFile;
  output.stdout(
    [
      `uniqueId=${result.context.uniqueId ?? ""}`,
      `phase=${result.context.phase}`,
      `--- ${entryFile} ---`,
      result.context.artifact?.code ?? "",
      "--- requirements.txt ---",
      result.context.artifact?.requirements ?? ""
    ].join("\n") + "\n"
  );
  return 0;
}

async function handleLaunch(workflow: LaunchWorkflow, parsed: ParsedArgs, output: CliOutput): Promise<number> {
  const request = buildRequest(parsed);
  const generated = await workflow.generate(request);
  if (!generated.ok) {
    return writeFailure(output, generated);
  }

  output.stderr(`Generated ${request.kind} app (${generated.context.uniqueId ?? ""}). Deploying...\n`);

  const deployed = await workflow.deploy(generated.context, (context) => {
    output.stderr(`phase=${context.phase}\n`);
  });
  if (!deployed.ok) {
    return writeFailure(output, deployed);
  }

  writeDeployment(output, deployed.context);

  if (request.pitchDeck || request.document) {
    const materials = await workflow.requestMaterials(deployed.context);
    if (!materials.ok) {
      output.stderr(`Materials were not requested: ${materials.error.message}\n`);
    } else {
      output.stdout(`materialsRequested=${String(materials.context.materialsRequested)}\n`);
    }
  }

  return 0;
}

async function handleMaterials(workflow: LaunchWorkflow, parsed: ParsedArgs, output: CliOutput): Promise<number> {
  const uniqueId = parsed.args[0]?.trim();
  if (!uniqueId) {
    throw new Error("Usage: materials <uniqueId>");
  }

  const result = await workflow.readMaterials(uniqueId);
  if (!result.ok) {
    output.stderr(`${result.error.kind} error: ${result.error.message}\n`);
    return 1;
  }

  output.stdout(
    [
      `uniqueId=${result.value.uniqueId}`,
      `pitchDeckUrl=${result.value.pitchDeckUrl ?? "pending"}`,
      `documentUrl=${result.value.documentUrl ?? "pending"}`
    ].join("\n") + "\n"
  );
  return 0;
}

/** Handles the commands that need neither configuration nor remote clients. */
function writeStatic(command: CliCommand, output: CliOutput): boolean {
  if (command === "phases") {
    output.stdout(`${renderMermaid(launchPhaseGraph)}\n`);
    return true;
  }

  if (command === "help") {
    output.stdout(`${commandUsage()}\n`);
    return true;
  }

  return false;
}

/** Runs one command and returns the process exit code. */
export async function runCli(argv: string[], workflow: LaunchWorkflow, output: CliOutput): Promise<number> {
  const parsed = parseArgs(argv);
  if (writeStatic(parsed.command, output)) {
    return 0;
  }

  try {
    switch (parsed.command) {
      case "generate":
        return await handleGenerate(workflow, parsed, output);
      case "launch":
        return await handleLaunch(workflow, parsed, output);
      case "materials":
        return await handleMaterials(workflow, parsed, output);
      default:
        output.stdout(`${commandUsage()}\n`);
        return 0;
    }
  } catch (error) {
    output.stderr(`${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const output: CliOutput = {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text)
  };

  const command = parseArgs(argv).command;
  if (writeStatic(command, output)) {
    return;
  }

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logError("cli.config_invalid", { issues: error.issues });
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const runtime = createRuntime(config);
  try {
    await runtime.ledger.initialize();
    process.exitCode = await runCli(argv, runtime.workflow, output);
  } finally {
    await runtime.ledger.close();
  }
}

const entryPath = process.argv[1];
if (entryPath && import.meta.url === pathToFileURL(entryPath).href) {
  main().catch((error) => {
    logError("cli.failed", serializeError(error));
    process.exitCode = 1;
  });
}
