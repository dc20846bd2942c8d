/**
 * CLI Rules Update Command
 *
 * Replaces the rule tree of one property version with the tree in a JSON
 * file. The file holds `{ "rules": {...}, "comments"?: "..." }`; the output
 * of `propctl rules get` is accepted as-is and its other fields ignored.
 */

import {
  formatFieldPath,
  type RulesUpdate,
  type RuleValidateMode,
  rulesSchema,
  type UpdateRulesResponse,
  updateRuleTree,
} from "@propctl/core";
import { readFile } from "fs/promises";
import { z } from "zod";
import { useAppContext } from "@/lib/context";
import { getErrorMessage } from "@/lib/errors";
import { log } from "@/lib/log";
import { reportProblems } from "./problems";

export type UpdateRulesOptions = {
  propertyId: string;
  version: number;
  /** Path to the rule tree JSON */
  file: string;
  contract?: string;
  group?: string;
  /** Validate without saving */
  dryRun?: boolean;
  validateMode?: RuleValidateMode;
  validate?: boolean;
};

const ruleTreeFileSchema = z.object({
  comments: z.string().optional(),
  rules: rulesSchema,
});

/**
 * Read and check a rule tree file.
 */
export async function readRuleTreeFile(path: string): Promise<RulesUpdate> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    throw new Error(`Failed to read ${path}: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Failed to parse ${path}: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }

  const result = ruleTreeFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `  ${formatFieldPath(issue.path)}: ${issue.message}`
    );
    throw new Error(`Invalid rule tree in ${path}:\n${issues.join("\n")}`);
  }
  return result.data;
}

export async function updateRules(
  options: UpdateRulesOptions
): Promise<UpdateRulesResponse> {
  const rules = await readRuleTreeFile(options.file);
  const ctx = useAppContext();

  log.debug(
    `${options.dryRun ? "Validating" : "Updating"} rules for ${options.propertyId} v${options.version}`
  );

  const result = await updateRuleTree(ctx.papi, {
    propertyId: options.propertyId,
    propertyVersion: options.version,
    contractId: options.contract,
    groupId: options.group,
    dryRun: options.dryRun,
    validateMode: options.validateMode,
    validateRules: options.validate,
    rules,
  });

  reportProblems(result);
  return result;
}
