/**
 * CLI Search Command
 *
 * Finds property versions by property name, hostname or edge hostname.
 */

import { type SearchItem, type SearchKey, searchProperties } from "@propctl/core";
import { useAppContext } from "@/lib/context";
import { log } from "@/lib/log";

export type SearchOptions = {
  key: SearchKey;
  value: string;
};

export async function search(options: SearchOptions): Promise<SearchItem[]> {
  const ctx = useAppContext();
  const result = await searchProperties(ctx.papi, {
    key: options.key,
    value: options.value,
  });

  const items = result.versions.items;
  log.debug(`Found ${items.length} versions matching ${options.key}=${options.value}`);
  return items;
}
