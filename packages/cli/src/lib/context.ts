/**
 * Application Context
 *
 * Loads config and credentials once at startup and builds the API
 * session and endpoint clients every command shares.
 */

import {
  EdgeGridSigner,
  type FetchFn,
  getErrorMessage,
  PapiClient,
  type RetryConfig,
  type Session,
  SiteShieldClient,
  createSession,
} from "@propctl/core";
import { type Config, loadConfig, type RetrySettings } from "./config";
import { log } from "./log";

/**
 * Application context loaded at startup
 */
export type AppContext = {
  config: Config;
  /** Credential section in use (flag, then config) */
  section: string;
  session: Session;
  papi: PapiClient;
  siteShield: SiteShieldClient;
};

export type CreateAppContextOptions = {
  /** Credential section (overrides config) */
  section?: string;
  /** Dump requests and responses at debug level */
  trace?: boolean;
  /** False turns retries off regardless of config */
  retries?: boolean;
  /** Fetch implementation; the global fetch when omitted */
  fetch?: FetchFn;
};

/**
 * Creates the application context: config, signer, session, clients.
 */
export async function createAppContext(
  options: CreateAppContextOptions = {}
): Promise<AppContext> {
  const config = await loadConfig();
  const section = options.section ?? config.section;
  log.debug(`Using credentials section "${section}"`);

  let signer: EdgeGridSigner;
  try {
    signer = EdgeGridSigner.fromEnv({ section });
  } catch (error) {
    throw new Error(
      `Failed to load credentials for section "${section}": ${getErrorMessage(error)}`,
      { cause: error }
    );
  }

  const retries =
    options.retries === false ? undefined : toRetryConfig(config.retries);
  log.debug(
    retries
      ? `Retrying GET requests up to ${retries.maxRetries} times`
      : "Retries disabled"
  );

  const session = createSession({
    signer,
    fetch: options.fetch,
    logger: log.sessionLogger,
    userAgent: config.userAgent,
    requestLimit: config.requestLimit,
    trace: options.trace,
    retries,
  });

  return {
    config,
    section,
    session,
    papi: new PapiClient(session, { usePrefixes: config.usePrefixes }),
    siteShield: new SiteShieldClient(session),
  };
}

function toRetryConfig(settings: RetrySettings): RetryConfig | undefined {
  if (!settings.enabled) {
    return undefined;
  }
  return {
    maxRetries: settings.maxRetries,
    minWaitMs: settings.minWaitMs,
    maxWaitMs: settings.maxWaitMs,
    excludedEndpoints: settings.excludedEndpoints,
  };
}

// =============================================================================
// Global Context
// =============================================================================

let globalContext: AppContext | null = null;

/**
 * Get the context set up by the CLI's preAction hook.
 */
export function useAppContext(): AppContext {
  if (!globalContext) {
    throw new Error("App context is not initialized");
  }
  return globalContext;
}

/**
 * Initialize the global app context.
 */
export async function initAppContext(
  options: CreateAppContextOptions = {}
): Promise<AppContext> {
  globalContext = await createAppContext(options);
  return globalContext;
}

export function resetAppContext() {
  globalContext = null;
}
