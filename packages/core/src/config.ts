import fs from "node:fs/promises";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";

export const DEFAULT_CONFIG_PATH = "agentdeck.config.yaml";

const positiveInt = z.number().int().positive();

export const AgentDeckConfigSchema = z.object({
  service: z
    .object({
      /** Project endpoint of the agent service. Required unless running offline. */
      endpoint: z.string().url().optional(),
      apiVersion: z.string().min(1).default("v1"),
      /** Bearer token sent with every request. */
      accessToken: z.string().min(1).optional(),
    })
    .default({}),
  model: z.string().min(1).default("gpt-4o"),
  search: z
    .object({
      connectionId: z.string().default(""),
      indexName: z.string().default(""),
    })
    .default({}),
  turn: z
    .object({
      pollIntervalMs: positiveInt.default(500),
      timeoutMs: positiveInt.default(60_000),
      maxAttempts: positiveInt.default(2),
      maxToolRounds: positiveInt.default(5),
    })
    .default({}),
  retry: z
    .object({
      maxAttempts: positiveInt.default(3),
      baseDelayMs: z.number().int().nonnegative().default(1000),
    })
    .default({}),
  storage: z
    .object({
      path: z.string().min(1).default(".agentdeck/conversations.db"),
    })
    .default({}),
  logging: z
    .object({
      level: z
        .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
        .default("info"),
    })
    .default({}),
});

export type AgentDeckConfig = z.infer<typeof AgentDeckConfigSchema>;

/** Environment variables and the config key each one overrides. */
const ENV_OVERRIDES: ReadonlyArray<readonly [string, ReadonlyArray<string>]> = [
  ["AGENTDECK_ENDPOINT", ["service", "endpoint"]],
  ["AGENTDECK_API_VERSION", ["service", "apiVersion"]],
  ["AGENTDECK_ACCESS_TOKEN", ["service", "accessToken"]],
  ["AGENTDECK_MODEL", ["model"]],
  ["AGENTDECK_SEARCH_CONNECTION_ID", ["search", "connectionId"]],
  ["AGENTDECK_SEARCH_INDEX", ["search", "indexName"]],
  ["AGENTDECK_DB", ["storage", "path"]],
  ["LOG_LEVEL", ["logging", "level"]],
];

/**
 * Load configuration from a YAML file, apply environment overrides and
 * validate. A missing file means "all defaults"; anything malformed throws
 * `ConfigError`.
 */
export async function loadConfig(
  filePath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): Promise<AgentDeckConfig> {
  const raw = await readYaml(filePath);

  for (const [name, keyPath] of ENV_OVERRIDES) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      setPath(raw, keyPath, value);
    }
  }

  return parseConfig(raw, filePath);
}

/** Validate an already-parsed document. */
export function parseConfig(raw: unknown, source = "<inline>"): AgentDeckConfig {
  const result = AgentDeckConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration in ${source}`, issues);
  }
  return result.data;
}

/** The service endpoint, or a ConfigError explaining how to set it. */
export function requireEndpoint(config: AgentDeckConfig): string {
  if (!config.service.endpoint) {
    throw new ConfigError(
      "Missing service.endpoint. Set it in agentdeck.config.yaml or AGENTDECK_ENDPOINT, or run with --offline"
    );
  }
  return config.service.endpoint;
}

async function readYaml(filePath: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isNodeError(err) && err.code === "ENOENT") return {};
    throw new ConfigError(`Cannot read ${filePath}: ${errorMessage(err)}`);
  }

  let doc: unknown;
  try {
    doc = yaml.load(text);
  } catch (err) {
    throw new ConfigError(`Malformed YAML in ${filePath}: ${errorMessage(err)}`);
  }

  if (doc === undefined || doc === null) return {};
  if (!isRecord(doc)) {
    throw new ConfigError(`Expected a mapping at the top of ${filePath}`);
  }
  return doc;
}

function setPath(target: Record<string, unknown>, keyPath: ReadonlyArray<string>, value: string): void {
  let node = target;
  for (const key of keyPath.slice(0, -1)) {
    const child = node[key];
    if (isRecord(child)) {
      node = child;
    } else {
      const created: Record<string, unknown> = {};
      node[key] = created;
      node = created;
    }
  }
  const leaf = keyPath[keyPath.length - 1];
  if (leaf !== undefined) node[leaf] = value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
