import type { PapiProblem } from "@propctl/core";
import { log } from "@/lib/log";

/**
 * One-line summary of a problem reported inside a successful response,
 * e.g. "Missing origin at #/rules/behaviors/0: hostname is required".
 */
export function formatProblem(problem: PapiProblem): string {
  const title = problem.title ?? problem.type ?? "Unknown problem";
  const location = problem.errorLocation ? ` at ${problem.errorLocation}` : "";
  return problem.detail
    ? `${title}${location}: ${problem.detail}`
    : `${title}${location}`;
}

export function reportProblems(
  response: { errors?: PapiProblem[]; warnings?: PapiProblem[] }
) {
  for (const problem of response.errors ?? []) {
    log.warn(`Error: ${formatProblem(problem)}`);
  }
  for (const problem of response.warnings ?? []) {
    log.warn(formatProblem(problem));
  }
}
