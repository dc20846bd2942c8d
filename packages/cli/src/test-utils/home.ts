import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { vi } from "vitest";
import { resetAppContext } from "@/lib/context";

export const TEST_API_HOST = "akab-test.luna.example.test";

/** Placeholder EdgeGrid credentials for the default section */
export const TEST_CREDENTIALS = {
  EDGEGRID_HOST: TEST_API_HOST,
  EDGEGRID_CLIENT_TOKEN: "test-client-token",
  EDGEGRID_CLIENT_SECRET: "test-secret",
  EDGEGRID_ACCESS_TOKEN: "test-access-token",
} as const;

/**
 * Point PROPCTL_HOME at a fresh temp directory and export placeholder
 * credentials. Returns a cleanup function for afterEach.
 */
export async function setupTestHome(prefix: string) {
  const homeDir = await mkdtemp(join(tmpdir(), prefix));
  vi.stubEnv("PROPCTL_HOME", homeDir);
  for (const [name, value] of Object.entries(TEST_CREDENTIALS)) {
    vi.stubEnv(name, value);
  }

  return {
    homeDir,
    cleanup: async () => {
      resetAppContext();
      vi.unstubAllEnvs();
      await rm(homeDir, { recursive: true, force: true });
    },
  };
}
