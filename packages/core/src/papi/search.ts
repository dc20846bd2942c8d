import { z } from "zod";
import { API_ENDPOINTS } from "../constants";
import { withOperation } from "../errors/errors";
import type { CallOptions } from "../session/request";
import { expectData } from "../session/session";
import { oneOf, requiredString } from "../validation/rules";
import { validateRequest } from "../validation/validate";
import type { PapiClient } from "./client";

export const SEARCH_KEYS = ["propertyName", "hostname", "edgeHostname"] as const;
export type SearchKey = (typeof SEARCH_KEYS)[number];

export const searchRequestSchema = z.object({
  key: oneOf(SEARCH_KEYS),
  value: requiredString(),
});

export type SearchRequest = z.input<typeof searchRequestSchema>;

export const searchItemSchema = z.object({
  accountId: z.string(),
  assetId: z.string(),
  contractId: z.string(),
  groupId: z.string(),
  productionStatus: z.string(),
  propertyId: z.string(),
  propertyName: z.string(),
  propertyVersion: z.number().int(),
  stagingStatus: z.string(),
  updatedByUser: z.string(),
  updatedDate: z.string(),
  hostname: z.string().optional(),
  edgeHostname: z.string().optional(),
});

export type SearchItem = z.infer<typeof searchItemSchema>;

export const searchResponseSchema = z.object({
  versions: z.object({
    items: z.array(searchItemSchema),
  }),
});

export type SearchResponse = z.infer<typeof searchResponseSchema>;

/**
 * Find property versions by property name, hostname or edge hostname.
 */
export async function searchProperties(
  papi: PapiClient,
  params: SearchRequest,
  options?: CallOptions
): Promise<SearchResponse> {
  return withOperation("searching properties", async () => {
    const invalid = validateRequest(searchRequestSchema, params);
    if (invalid) {
      throw invalid;
    }
    papi.log(options).debug(`POST search ${params.key}`);

    const response = await papi.exec(
      { method: "POST", path: API_ENDPOINTS.papi.search, options },
      searchResponseSchema,
      { [params.key]: params.value }
    );
    if (response.status !== 200) {
      throw papi.error(response);
    }
    return expectData(response);
  });
}
