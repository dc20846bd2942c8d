import { z } from "zod";
import { API_ENDPOINTS } from "../constants";
import { withOperation } from "../errors/errors";
import type { CallOptions } from "../session/request";
import { expectData } from "../session/session";
import type { PapiClient } from "./client";

export const getRuleFormatsResponseSchema = z.object({
  ruleFormats: z.object({
    items: z.array(z.string()),
  }),
});

export type GetRuleFormatsResponse = z.infer<typeof getRuleFormatsResponseSchema>;

/**
 * List the rule formats the account can request rule trees in.
 */
export async function getRuleFormats(
  papi: PapiClient,
  options?: CallOptions
): Promise<GetRuleFormatsResponse> {
  return withOperation("fetching rule formats", async () => {
    papi.log(options).debug("GET rule formats");

    const response = await papi.exec(
      { method: "GET", path: API_ENDPOINTS.papi.ruleFormats, options },
      getRuleFormatsResponseSchema
    );
    if (response.status !== 200) {
      throw papi.error(response);
    }
    return expectData(response);
  });
}
