/**
 * CLI Rule Formats Command
 *
 * Lists the rule formats rule trees can be requested in.
 */

import { getRuleFormats } from "@propctl/core";
import { useAppContext } from "@/lib/context";
import { log } from "@/lib/log";

export async function listRuleFormats(): Promise<string[]> {
  const ctx = useAppContext();
  const result = await getRuleFormats(ctx.papi);
  const formats = result.ruleFormats.items;
  log.debug(`Received ${formats.length} rule formats`);
  return formats;
}
