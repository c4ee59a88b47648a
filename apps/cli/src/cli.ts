import { createInterface } from "node:readline/promises";
import { parseArgs } from "node:util";
import { config as loadEnvFile } from "dotenv";
import {
  SettingsFileError,
  buildAzureSearchDataSource,
  createConfigurationService,
  type ChatTransport,
  type RagConfiguration,
  type SettingsMap
} from "@rag-client/core";
import { createAzureOpenAiChatTransport, resolveApiVersion } from "./lib/azure-openai-chat.js";
import { createAccessTokenProvider } from "./lib/credentials.js";
import { readSettingsFile } from "./lib/settings-file.js";
import { createEventLogger } from "./logging.js";
import { isExitCommand, renderAnswer, renderMissingSettings, renderRequestError } from "./render.js";
import { ChatSession } from "./session.js";

export const DEFAULT_ENV_FILES = [".env"];
export const ENV_SYSTEM_PROMPT = "RAG_CLIENT_SYSTEM_PROMPT";

const KNOWN_OPTIONS = new Set(["settings", "env"]);

export type ParsedCliArgs = {
  settingsPath?: string;
  envFiles: string[];
  query?: string;
};

export type CliDeps = {
  argv: string[];
  env: Record<string, string | undefined>;
  input: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  write: (line: string) => void;
  cwd?: string;
  loadEnvFiles?: (files: readonly string[]) => void;
  createTransport?: (config: RagConfiguration, env: Record<string, string | undefined>) => ChatTransport;
};

function readStringOption(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function readStringListOption(value: unknown): string[] {
  if (typeof value === "string") {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter((entry): entry is string => typeof entry === "string");
  }
  return [];
}

/**
 * Everything that is not `--settings` or `--env` is part of the question, including
 * words that look like flags (`-5 deductible?`).
 */
export function parseCliArgs(argv: string[]): ParsedCliArgs {
  const { values, tokens } = parseArgs({
    args: argv,
    strict: false,
    allowPositionals: true,
    tokens: true,
    options: {
      settings: { type: "string" },
      env: { type: "string", multiple: true }
    }
  });

  // Short option groups yield one token per letter with the same index.
  const words = new Map<number, string>();
  for (const token of tokens) {
    if (token.kind === "positional") {
      words.set(token.index, token.value);
    } else if (token.kind === "option" && !KNOWN_OPTIONS.has(token.name)) {
      words.set(token.index, argv[token.index] ?? token.rawName);
    }
  }
  const query = [...words.entries()]
    .sort(([left], [right]) => left - right)
    .map(([, word]) => word)
    .join(" ");

  const envFiles = readStringListOption(values.env);
  return {
    settingsPath: readStringOption(values.settings),
    envFiles: envFiles.length > 0 ? envFiles : DEFAULT_ENV_FILES,
    query: query.length > 0 ? query : undefined
  };
}

function loadEnvFilesIntoProcess(files: readonly string[]): void {
  for (const envFile of files) {
    loadEnvFile({ path: envFile });
  }
}

function createAzureTransport(config: RagConfiguration, env: Record<string, string | undefined>): ChatTransport {
  return createAzureOpenAiChatTransport({
    endpoint: config.endpoint,
    deploymentName: config.chatDeploymentName,
    apiVersion: resolveApiVersion(env),
    getAccessToken: createAccessTokenProvider()
  });
}

async function askAndPrint(
  session: ChatSession,
  query: string,
  print: (lines: readonly string[]) => void
): Promise<void> {
  try {
    print(renderAnswer(await session.ask(query)));
  } catch (error) {
    print(renderRequestError(error));
  }
}

/** Runs one CLI invocation and resolves with the process exit code. */
export async function runCli(deps: CliDeps): Promise<number> {
  const print = (lines: readonly string[]) => {
    for (const line of lines) {
      deps.write(line);
    }
  };

  const args = parseCliArgs(deps.argv);
  print(["=== RAG Client (Azure CLI credential) ===", ""]);

  (deps.loadEnvFiles ?? loadEnvFilesIntoProcess)(args.envFiles);

  let settings: SettingsMap;
  try {
    settings = await readSettingsFile({ filePath: args.settingsPath, cwd: deps.cwd });
  } catch (error) {
    if (error instanceof SettingsFileError) {
      print(renderRequestError(error));
      return 1;
    }
    throw error;
  }

  const configurationService = createConfigurationService({ settings, env: deps.env });
  const config = configurationService.load();
  const validation = configurationService.validate(config);
  if (!validation.isValid) {
    print(renderMissingSettings(validation.missingSettings));
    return 1;
  }

  const session = new ChatSession({
    transport: (deps.createTransport ?? createAzureTransport)(config, deps.env),
    dataSource: buildAzureSearchDataSource(config),
    systemPrompt: deps.env[ENV_SYSTEM_PROMPT]?.trim() || undefined,
    deployment: config.chatDeploymentName,
    logger: createEventLogger({ env: deps.env })
  });

  if (args.query === undefined) {
    print(["RAG Client Ready! Enter your questions (type 'exit' to quit):", ""]);

    const rl = createInterface({ input: deps.input, output: deps.output });
    rl.setPrompt("Question: ");
    rl.prompt();
    for await (const line of rl) {
      if (isExitCommand(line)) {
        break;
      }
      await askAndPrint(session, line, print);
      rl.prompt();
    }
    rl.close();

    print(["Goodbye!"]);
    return 0;
  }

  print(["Testing basic Azure OpenAI connection..."]);
  try {
    const greeting = await session.checkConnection();
    print([`Connected to Azure AI: ${greeting}`, ""]);
  } catch (error) {
    print([`Connection error: ${error instanceof Error ? error.message : String(error)}`, ""]);
    return 1;
  }

  print(["Starting RAG query..."]);
  await askAndPrint(session, args.query, print);
  return 0;
}
