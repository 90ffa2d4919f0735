import { z } from "zod";

export interface ServerConfig {
  root: string;
  host: string;
  port: number;
  tls: { cert: string; key: string } | null;
  credentialsFile: string | null;
  basePath: string;
  verbose: boolean;
}

export interface CliOptions {
  host?: string;
  port?: string;
  cert?: string;
  key?: string;
  credentials?: string;
  basePath?: string;
  verbose?: boolean;
}

const ConfigSchema = z
  .object({
    root: z.string().min(1),
    host: z.string().min(1).default("127.0.0.1"),
    port: z.coerce.number().int().min(1).max(65535).default(8080),
    cert: z.string().min(1).optional(),
    key: z.string().min(1).optional(),
    credentials: z.string().min(1).optional(),
    basePath: z.string().default(""),
    verbose: z.boolean().default(false),
  })
  .refine((config) => (config.cert === undefined) === (config.key === undefined), {
    message: "Both a certificate and a key are required for HTTPS",
  });

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function resolveConfig(root: string, options: CliOptions): ServerConfig {
  const result = ConfigSchema.safeParse({ root, ...options });
  if (!result.success) {
    const issue = result.error.issues[0];
    const message = issue ? `${issue.path.join(".") || "config"}: ${issue.message}` : "Invalid configuration";
    throw new ConfigError(message);
  }

  const { cert, key, credentials, ...rest } = result.data;
  return {
    ...rest,
    tls: cert !== undefined && key !== undefined ? { cert, key } : null,
    credentialsFile: credentials ?? null,
  };
}
