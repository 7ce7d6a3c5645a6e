#!/usr/bin/env node
import * as fs from "fs";
import * as path from "path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { analyzeCode } from "./logic/analyzer";
import { SourceFileNotFoundError } from "./logic/errors";
import { FlowConfiguration, loadFlowConfig } from "./logic/utils/FlowConfig";
import { logDebug, logInfo, setLogLevel } from "./logic/utils/Logger";

export const OUTPUT_EXTENSION = ".flow.md";

interface CliArgs {
  source: string;
  method?: string;
  config?: string;
  verbose: boolean;
}

/**
 * `Page.aspx.cs` -> `Page.aspx.flow.md`, next to the input.
 */
export function outputPathFor(sourcePath: string): string {
  const parsed = path.parse(sourcePath);
  return path.join(parsed.dir, `${parsed.name}${OUTPUT_EXTENSION}`);
}

/**
 * Reads a C# file, writes its flow diagram beside it and returns the
 * output path.
 */
export function generateFlowFile(
  sourcePath: string,
  methodName?: string,
  config?: FlowConfiguration
): string {
  if (!fs.existsSync(sourcePath)) {
    throw new SourceFileNotFoundError(sourcePath);
  }

  const code = fs.readFileSync(sourcePath, "utf8");
  const { ir, document } = analyzeCode(code, methodName, config);
  logDebug(`Rendered ${ir.sections.length} section(s) from ${sourcePath}`);

  const outputPath = outputPathFor(sourcePath);
  fs.writeFileSync(outputPath, document);
  logInfo(`Wrote ${outputPath}`);
  return outputPath;
}

function parseArgs(argv: string[]): CliArgs {
  const parsed = yargs(argv)
    .scriptName("cs-flowchart")
    .usage(
      "$0 <source> [method]\n\n" +
        "Writes a mermaid flow diagram of a C# code-behind file.\n" +
        "Without a method name, Page_Load and the event handlers are diagrammed."
    )
    .option("config", {
      type: "string",
      describe: "JSON file overriding generation settings",
    })
    .option("verbose", {
      type: "boolean",
      default: false,
      describe: "Log diagnostics to stderr",
    })
    .demandCommand(
      1,
      2,
      "A source file path is required",
      "Expected at most a source file and a method name"
    )
    .example("$0 TicketEntry.aspx.cs Page_Load", "Diagram a single method")
    .strictOptions()
    .help()
    .parseSync();

  const [source, method] = parsed._.map(String);
  return {
    source: source ?? "",
    method,
    config: parsed.config,
    verbose: parsed.verbose,
  };
}

export function runCli(argv: string[]): number {
  const args = parseArgs(argv);
  if (args.verbose) {
    setLogLevel("debug");
  }

  try {
    const config = loadFlowConfig(args.config);
    const outputPath = generateFlowFile(args.source, args.method, config);
    console.log(`Flow diagram generated: ${outputPath}`);
    console.log("Open it in any Markdown viewer with mermaid support.");
    return 0;
  } catch (error) {
    logDebug("Flow generation failed", error);
    console.error(
      `Error: ${error instanceof Error ? error.message : String(error)}`
    );
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = runCli(hideBin(process.argv));
}
