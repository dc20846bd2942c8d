/**
 * CLI Rules Get Command
 *
 * Fetches the rule tree of one property version. The JSON printed on
 * stdout can be edited and passed back to `propctl rules update`.
 */

import {
  type GetRuleTreeResponse,
  getRuleTree,
  type RuleValidateMode,
} from "@propctl/core";
import { useAppContext } from "@/lib/context";
import { log } from "@/lib/log";
import { reportProblems } from "./problems";

export type GetRulesOptions = {
  propertyId: string;
  version: number;
  contract?: string;
  group?: string;
  /** Frozen rule format, e.g. v2024-01-09 */
  ruleFormat?: string;
  validateMode?: RuleValidateMode;
  /** Ask the API to validate the tree it returns */
  validate?: boolean;
};

export async function getRules(
  options: GetRulesOptions
): Promise<GetRuleTreeResponse> {
  const ctx = useAppContext();
  log.debug(`Fetching rules for ${options.propertyId} v${options.version}`);

  const tree = await getRuleTree(ctx.papi, {
    propertyId: options.propertyId,
    propertyVersion: options.version,
    contractId: options.contract,
    groupId: options.group,
    ruleFormat: options.ruleFormat,
    validateMode: options.validateMode,
    validateRules: options.validate,
  });

  log.debug(`Rule tree etag ${tree.etag}, format ${tree.ruleFormat}`);
  reportProblems(tree);
  return tree;
}
