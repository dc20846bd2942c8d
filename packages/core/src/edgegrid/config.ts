/**
 * EdgeGrid credentials
 *
 * Credentials come from the environment:
 *   EDGEGRID_HOST, EDGEGRID_CLIENT_TOKEN, EDGEGRID_CLIENT_SECRET,
 *   EDGEGRID_ACCESS_TOKEN, and optionally EDGEGRID_MAX_BODY.
 * A named section reads EDGEGRID_<SECTION>_* first and falls back to the
 * unprefixed variables when the section is incomplete.
 */

import { z } from "zod";

export const DEFAULT_SECTION = "default";
export const DEFAULT_MAX_BODY = 131_072;

const ENV_PREFIX = "EDGEGRID";

export const edgeGridConfigSchema = z.object({
  host: z.string().min(1, "host cannot be blank"),
  clientToken: z.string().min(1, "client token cannot be blank"),
  clientSecret: z.string().min(1, "client secret cannot be blank"),
  accessToken: z.string().min(1, "access token cannot be blank"),
  maxBody: z.number().int().positive().default(DEFAULT_MAX_BODY),
  /** Extra header names included in the signature */
  headersToSign: z.array(z.string()).default([]),
});

export type EdgeGridConfig = z.output<typeof edgeGridConfigSchema>;
export type EdgeGridConfigInput = z.input<typeof edgeGridConfigSchema>;

export class EdgeGridConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EdgeGridConfigError";
  }
}

const REQUIRED_VARIABLES = {
  host: "HOST",
  clientToken: "CLIENT_TOKEN",
  clientSecret: "CLIENT_SECRET",
  accessToken: "ACCESS_TOKEN",
} as const;

type EnvLookup = { config?: EdgeGridConfig; missing: string[] };

function readPrefixed(env: NodeJS.ProcessEnv, prefix: string): EnvLookup {
  const missing: string[] = [];
  const read = (suffix: string) => {
    const name = `${prefix}_${suffix}`;
    const value = env[name];
    if (!value) {
      missing.push(name);
    }
    return value ?? "";
  };

  const values = {
    host: read(REQUIRED_VARIABLES.host),
    clientToken: read(REQUIRED_VARIABLES.clientToken),
    clientSecret: read(REQUIRED_VARIABLES.clientSecret),
    accessToken: read(REQUIRED_VARIABLES.accessToken),
  };
  if (missing.length > 0) {
    return { missing };
  }

  const maxBody = Number.parseInt(env[`${prefix}_MAX_BODY`] ?? "", 10);
  return {
    config: edgeGridConfigSchema.parse({
      ...values,
      ...(maxBody > 0 && { maxBody }),
    }),
    missing,
  };
}

export type LoadEdgeGridConfigOptions = {
  section?: string;
  env?: NodeJS.ProcessEnv;
};

export function loadEdgeGridConfig(
  options: LoadEdgeGridConfigOptions = {}
): EdgeGridConfig {
  const env = options.env ?? process.env;
  const section = options.section ?? DEFAULT_SECTION;

  if (section !== DEFAULT_SECTION) {
    const sectionPrefix = `${ENV_PREFIX}_${section.toUpperCase().replace(/[^A-Z0-9]/g, "_")}`;
    const fromSection = readPrefixed(env, sectionPrefix);
    if (fromSection.config) {
      return fromSection.config;
    }
    const fallback = readPrefixed(env, ENV_PREFIX);
    if (fallback.config) {
      return fallback.config;
    }
    throw missingError(fromSection.missing);
  }

  const lookup = readPrefixed(env, ENV_PREFIX);
  if (!lookup.config) {
    throw missingError(lookup.missing);
  }
  return lookup.config;
}

function missingError(missing: string[]) {
  return new EdgeGridConfigError(
    `required environment variables missing: ${missing.join(", ")}`
  );
}
