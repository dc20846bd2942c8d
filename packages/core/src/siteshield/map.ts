/**
 * Site Shield maps
 *
 * A map lists the CIDR blocks edge servers use to reach an origin.
 * When the blocks change, the new set is proposed and has to be
 * acknowledged before it takes effect.
 */

import { z } from "zod";
import { API_ENDPOINTS } from "../constants";
import { withOperation } from "../errors/errors";
import { ApiClient } from "../session/api-client";
import type { CallOptions } from "../session/request";
import { expectData } from "../session/session";
import { requiredInt } from "../validation/rules";
import { validateRequest } from "../validation/validate";

export class SiteShieldClient extends ApiClient {}

export const siteShieldMapRequestSchema = z.object({
  uniqueId: requiredInt(),
});

export type SiteShieldMapRequest = z.input<typeof siteShieldMapRequestSchema>;

export const siteShieldMapSchema = z.object({
  acknowledged: z.boolean(),
  contacts: z.array(z.string()),
  currentCidrs: z.array(z.string()),
  proposedCidrs: z.array(z.string()),
  ruleName: z.string(),
  type: z.string(),
  service: z.string(),
  shared: z.boolean(),
  /** Epoch milliseconds */
  acknowledgeRequiredBy: z.number().int(),
  previouslyAcknowledgedOn: z.number().int(),
  id: z.number().int().optional(),
  latestTicketId: z.number().int().optional(),
  mapAlias: z.string().optional(),
  mcmMapRuleId: z.number().int().optional(),
});

export type SiteShieldMap = z.infer<typeof siteShieldMapSchema>;

export const getSiteShieldMapsResponseSchema = z.object({
  siteShieldMaps: z.array(siteShieldMapSchema),
});

export type GetSiteShieldMapsResponse = z.infer<typeof getSiteShieldMapsResponseSchema>;

/**
 * List every map the credentials can see.
 */
export async function getSiteShieldMaps(
  client: SiteShieldClient,
  options?: CallOptions
): Promise<GetSiteShieldMapsResponse> {
  return withOperation("fetching site shield maps", async () => {
    client.log(options).debug("GET site shield maps");

    const response = await client.exec(
      { method: "GET", path: API_ENDPOINTS.siteShield.maps, options },
      getSiteShieldMapsResponseSchema
    );
    if (response.status !== 200) {
      throw client.error(response);
    }
    return expectData(response);
  });
}

export async function getSiteShieldMap(
  client: SiteShieldClient,
  params: SiteShieldMapRequest,
  options?: CallOptions
): Promise<SiteShieldMap> {
  return withOperation("fetching site shield map", async () => {
    const invalid = validateRequest(siteShieldMapRequestSchema, params);
    if (invalid) {
      throw invalid;
    }
    client.log(options).debug(`GET site shield map ${params.uniqueId}`);

    const response = await client.exec(
      { method: "GET", path: API_ENDPOINTS.siteShield.map(params.uniqueId), options },
      siteShieldMapSchema
    );
    if (response.status !== 200) {
      throw client.error(response);
    }
    return expectData(response);
  });
}

/**
 * Accept the proposed CIDR blocks of a map.
 */
export async function ackSiteShieldMap(
  client: SiteShieldClient,
  params: SiteShieldMapRequest,
  options?: CallOptions
): Promise<SiteShieldMap> {
  return withOperation("acknowledging site shield map", async () => {
    const invalid = validateRequest(siteShieldMapRequestSchema, params);
    if (invalid) {
      throw invalid;
    }
    client.log(options).debug(`POST acknowledge site shield map ${params.uniqueId}`);

    const response = await client.exec(
      {
        method: "POST",
        path: API_ENDPOINTS.siteShield.acknowledge(params.uniqueId),
        options,
      },
      siteShieldMapSchema
    );
    if (response.status !== 200) {
      throw client.error(response);
    }
    return expectData(response);
  });
}
