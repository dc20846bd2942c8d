#!/usr/bin/env node

import {
  RULE_VALIDATE_MODES,
  type RuleValidateMode,
  SEARCH_KEYS,
  type SearchKey,
} from "@propctl/core";
import { Argument, Command, Option } from "commander";
import { createRequire } from "module";
import { listRuleFormats } from "@/commands/rule-formats";
import { getRules } from "@/commands/rules/get";
import { updateRules } from "@/commands/rules/update";
import { search } from "@/commands/search";
import { ackMap, getMap, listMaps } from "@/commands/siteshield";
import { parsePositiveInt } from "@/lib/args";
import { initAppContext } from "@/lib/context";
import { getErrorHint, getErrorMessage } from "@/lib/errors";
import { log, ui } from "@/lib/log";

const require = createRequire(import.meta.url);
const packageJson = require("../package.json") as { version: string };

type GlobalFlags = {
  verbose?: boolean;
  trace?: boolean;
  section?: string;
  /** Commander sets this to false for --no-retries */
  retries: boolean;
};

type RuleTreeFlags = {
  contract?: string;
  group?: string;
  validateMode?: RuleValidateMode;
  /** Commander sets this to false for --no-validate */
  validate: boolean;
};

const program = new Command();

program
  .name("propctl")
  .description("Manage property rule trees and site shield maps")
  .version(packageJson.version)
  .option("-v, --verbose", "Enable verbose/debug output")
  .option("--trace", "Dump every request and response (implies --verbose)")
  .option("-s, --section <name>", "Credential section (EDGEGRID_<SECTION>_*)")
  .option("--no-retries", "Do not retry failed GET requests")
  .configureOutput({
    outputError: (str, write) => write(ui.error(str.trim())),
  })
  .hook("preAction", async (thisCommand) => {
    const opts = thisCommand.opts<GlobalFlags>();
    if (opts.verbose || opts.trace) {
      log.setVerbose(true);
    }

    await initAppContext({
      section: opts.section,
      trace: opts.trace,
      retries: opts.retries,
    });
  })
  .showHelpAfterError();

// =============================================================================
// rule-formats - List available rule formats
// =============================================================================

program
  .command("rule-formats")
  .description("List the rule formats rule trees can be frozen to")
  .action(
    handle(async () => {
      const formats = await withSpinner("Fetching rule formats...", () =>
        listRuleFormats()
      );
      log.print(ui.json(formats));
      log.info(`Rule formats ${ui.count(formats.length)}`);
    })
  );

// =============================================================================
// rules - Read and replace rule trees
// =============================================================================

const rulesCommand = program
  .command("rules")
  .description("Read and replace property rule trees");

rulesCommand
  .command("get")
  .description("Print the rule tree of a property version")
  .argument("<propertyId>", "Property id (e.g. prp_123)")
  .argument("<version>", "Property version", parsePositiveInt)
  .option("--contract <id>", "Contract id")
  .option("--group <id>", "Group id")
  .option("--rule-format <format>", "Rule format to return the tree in")
  .addOption(
    new Option("--validate-mode <mode>", "Validation depth").choices(
      RULE_VALIDATE_MODES
    )
  )
  .option("--no-validate", "Skip rule validation")
  .action(
    handle(
      async (
        propertyId: string,
        version: number,
        options: RuleTreeFlags & { ruleFormat?: string }
      ) => {
        const tree = await withSpinner(
          `Fetching rules for ${ui.propertyVersion(propertyId, version)}...`,
          () =>
            getRules({
              propertyId,
              version,
              contract: options.contract,
              group: options.group,
              ruleFormat: options.ruleFormat,
              validateMode: options.validateMode,
              validate: options.validate,
            })
        );
        log.print(ui.json(tree));
      }
    )
  );

rulesCommand
  .command("update")
  .description("Replace the rule tree of a property version")
  .argument("<propertyId>", "Property id (e.g. prp_123)")
  .argument("<version>", "Property version", parsePositiveInt)
  .requiredOption("-f, --file <path>", "Rule tree JSON file")
  .option("--contract <id>", "Contract id")
  .option("--group <id>", "Group id")
  .option("--dry-run", "Validate the tree without saving it")
  .addOption(
    new Option("--validate-mode <mode>", "Validation depth").choices(
      RULE_VALIDATE_MODES
    )
  )
  .option("--no-validate", "Skip rule validation")
  .action(
    handle(
      async (
        propertyId: string,
        version: number,
        options: RuleTreeFlags & { file: string; dryRun?: boolean }
      ) => {
        const dryRun = Boolean(options.dryRun);
        const result = await withSpinner(
          `${dryRun ? "Validating" : "Updating"} rules for ${ui.propertyVersion(propertyId, version)}...`,
          () =>
            updateRules({
              propertyId,
              version,
              file: options.file,
              contract: options.contract,
              group: options.group,
              dryRun,
              validateMode: options.validateMode,
              validate: options.validate,
            })
        );
        log.print(ui.json(result));

        const errorCount = result.errors?.length ?? 0;
        if (errorCount > 0) {
          log.warn(`Rule tree has ${errorCount} validation errors`);
        } else if (dryRun) {
          log.success("Rule tree is valid (dry run, nothing saved)");
        } else {
          log.success(`Updated rules, etag ${ui.code(result.etag)}`);
        }
      }
    )
  );

// =============================================================================
// search - Find property versions
// =============================================================================

program
  .command("search")
  .description("Find property versions by name or hostname")
  .addArgument(new Argument("<key>", "Field to match").choices(SEARCH_KEYS))
  .argument("<value>", "Value to look for")
  .action(
    handle(async (key: SearchKey, value: string) => {
      const items = await withSpinner(`Searching ${key}...`, () =>
        search({ key, value })
      );
      log.print(ui.json(items));
      if (items.length === 0) {
        log.info(ui.hint(`No property versions match ${key} ${value}`));
      }
    })
  );

// =============================================================================
// siteshield - Site shield maps
// =============================================================================

const siteShieldCommand = program
  .command("siteshield")
  .description("List and acknowledge site shield maps");

siteShieldCommand
  .command("list")
  .description("List site shield maps")
  .action(
    handle(async () => {
      const maps = await withSpinner("Fetching site shield maps...", () =>
        listMaps()
      );
      log.print(ui.json(maps));

      const pending = maps.filter((map) => !map.acknowledged);
      if (pending.length > 0) {
        log.info(`Awaiting acknowledgement ${ui.count(pending.length)}`);
        log.info(ui.list(pending.map((map) => `${map.ruleName} ${ui.muted(map.service)}`)));
      }
    })
  );

siteShieldCommand
  .command("get")
  .description("Show one site shield map")
  .argument("<id>", "Map id", parsePositiveInt)
  .action(
    handle(async (id: number) => {
      const map = await withSpinner(`Fetching map ${id}...`, () => getMap(id));
      log.print(ui.json(map));
    })
  );

siteShieldCommand
  .command("ack")
  .description("Acknowledge the proposed CIDRs of a site shield map")
  .argument("<id>", "Map id", parsePositiveInt)
  .action(
    handle(async (id: number) => {
      const map = await withSpinner(`Acknowledging map ${id}...`, () =>
        ackMap(id)
      );
      log.print(ui.json(map));
      log.success(`Map ${ui.code(map.ruleName)} acknowledged`);
    })
  );

// =============================================================================
// Parse and run
// =============================================================================

program.parseAsync(process.argv).catch((err: unknown) => {
  reportError(err);
  process.exitCode = 1;
});

// =============================================================================
// Helpers
// =============================================================================

function handle<TArgs extends unknown[]>(
  fn: (...args: TArgs) => Promise<void>
) {
  return async (...args: TArgs) => {
    try {
      await fn(...args);
    } catch (err) {
      reportError(err);
      process.exitCode = 1;
    }
  };
}

async function withSpinner<T>(message: string, fn: () => Promise<T>) {
  const spinner = await log.spinner(message);
  try {
    const result = await fn();
    spinner.stop();
    return result;
  } catch (err) {
    spinner.stop();
    throw err;
  }
}

function reportError(err: unknown) {
  log.error(getErrorMessage(err));
  const hint = getErrorHint(err);
  if (hint) {
    log.info(ui.hint(hint));
  }
}
