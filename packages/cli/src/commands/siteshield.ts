/**
 * CLI Site Shield Commands
 *
 * List, inspect and acknowledge site shield maps.
 */

import {
  ackSiteShieldMap,
  getSiteShieldMap,
  getSiteShieldMaps,
  type SiteShieldMap,
} from "@propctl/core";
import { useAppContext } from "@/lib/context";
import { log } from "@/lib/log";

export async function listMaps(): Promise<SiteShieldMap[]> {
  const ctx = useAppContext();
  const { siteShieldMaps } = await getSiteShieldMaps(ctx.siteShield);

  const pending = siteShieldMaps.filter((map) => !map.acknowledged).length;
  log.debug(`Received ${siteShieldMaps.length} maps, ${pending} awaiting acknowledgement`);
  return siteShieldMaps;
}

export async function getMap(id: number): Promise<SiteShieldMap> {
  const ctx = useAppContext();
  return getSiteShieldMap(ctx.siteShield, { uniqueId: id });
}

/**
 * Acknowledge a map's proposed CIDRs. Already acknowledged maps are
 * returned without a second request.
 */
export async function ackMap(id: number): Promise<SiteShieldMap> {
  const ctx = useAppContext();
  const current = await getSiteShieldMap(ctx.siteShield, { uniqueId: id });
  if (current.acknowledged) {
    log.info(`Map ${id} is already acknowledged`);
    return current;
  }
  return ackSiteShieldMap(ctx.siteShield, { uniqueId: id });
}
