import { loadConfig } from "../config";
import { runDownloadShard } from "../core/commands";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createStatsSink } from "../sink";
import { FileSystemRegistry } from "../storage";
import { createWriterFactory } from "../writer";

export type CommandName = "download";

export interface ParsedCliArgs {
  command: CommandName;
  shardId: number;
  shardPath: string;
  configPath?: string;
}

const HELP_TEXT = `
Usage:
  shardfetch <command> [options]

Commands:
  download --shard-id <n> --shard-path <locator>

Options:
  --config <path>        Optional path to JSON config file
  --shard-id <n>         Id of the shard, used in sample keys and output names
  --shard-path <locator> Arrow IPC file holding the shard (local path or s3://bucket/key)
  -h, --help             Show this help
`;

function readOption(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  return index >= 0 ? argv[index + 1] : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  if (argv[0] !== "download") {
    return "help";
  }

  const shardIdRaw = readOption(argv, "--shard-id");
  const shardId = shardIdRaw !== undefined && /^\d+$/.test(shardIdRaw) ? Number.parseInt(shardIdRaw, 10) : undefined;
  const shardPath = readOption(argv, "--shard-path");
  if (shardId === undefined || !shardPath) {
    return "help";
  }

  return {
    command: "download",
    shardId,
    shardPath,
    configPath: readOption(argv, "--config"),
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = loadConfig(parsed.configPath);
  const runId = createRunId();
  const fileSystems = new FileSystemRegistry();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId });
  const context = {
    runId,
    config,
    logger: logger.child("download"),
    metrics,
    fileSystems,
    writerFactory: createWriterFactory(config, fileSystems),
    statsSink: createStatsSink(config, fileSystems),
  };

  logger.info("command_start", {
    command: parsed.command,
    shardId: parsed.shardId,
    threadCount: config.threadCount,
    outputFormat: config.outputFormat,
  });

  try {
    const result = await runDownloadShard(context, { shardId: parsed.shardId, shardPath: parsed.shardPath });
    logger.info("command_complete", { command: parsed.command, ok: result.ok });
    return result.ok ? 0 : 1;
  } finally {
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
