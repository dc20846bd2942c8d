/**
 * Rule trees
 *
 * A property version's configuration is one rule tree: a named root rule
 * with behaviors, criteria, variables and nested child rules. The wire
 * schemas below decode what the API returns; the request schemas enforce
 * the field rules before an update is sent.
 */

import { z } from "zod";
import { API_ENDPOINTS, HEADERS } from "../constants";
import { withOperation } from "../errors/errors";
import { type JsonObject, jsonObjectSchema } from "../json/json-value";
import type { CallOptions } from "../session/request";
import { expectData } from "../session/session";
import { matching, oneOf, presentString, requiredInt, requiredString } from "../validation/rules";
import { validateRequest } from "../validation/validate";
import type { PapiClient } from "./client";
import { papiProblemSchema, papiResponseSchema } from "./response";

export const RULE_VALIDATE_MODES = ["fast", "full"] as const;
export type RuleValidateMode = (typeof RULE_VALIDATE_MODES)[number];

export const RULE_CRITERIA_MUST_SATISFY = ["all", "any"] as const;
export type RuleCriteriaMustSatisfy = (typeof RULE_CRITERIA_MUST_SATISFY)[number];

/** `latest` or a dated format such as `v2024-01-09` */
export const RULE_FORMAT_PATTERN = /^(latest|v\d{4}-\d{2}-\d{2})$/;

export const RULE_TREE_OPERATIONS = {
  getRuleTree: "fetching rule tree",
  updateRuleTree: "updating rule tree",
} as const;

// =============================================================================
// Types
// =============================================================================

export type RuleBehavior = {
  name: string;
  options: JsonObject;
  locked?: boolean;
  uuid?: string;
  templateUuid?: string;
};

export type RuleCustomOverride = {
  name: string;
  overrideId: string;
};

export type RuleOptions = {
  is_secure?: boolean;
};

export type RuleVariable = {
  name: string;
  /** Absent, null and "" are kept apart */
  description?: string | null;
  hidden: boolean;
  sensitive: boolean;
  value: string | null;
};

export type Rules = {
  name: string;
  advancedOverride?: string;
  behaviors?: RuleBehavior[];
  children?: Rules[];
  comments?: string;
  criteria?: RuleBehavior[];
  criteriaLocked?: boolean;
  criteriaMustSatisfy?: RuleCriteriaMustSatisfy;
  customOverride?: RuleCustomOverride;
  options?: RuleOptions;
  uuid?: string;
  templateUuid?: string;
  templateLink?: string;
  variables?: RuleVariable[];
};

export type RulesUpdate = {
  comments?: string;
  rules: Rules;
};

// =============================================================================
// Wire schemas
// =============================================================================

export const ruleBehaviorSchema = z.object({
  name: z.string(),
  options: jsonObjectSchema,
  locked: z.boolean().optional(),
  uuid: z.string().optional(),
  templateUuid: z.string().optional(),
});

const ruleOptionsSchema = z.object({ is_secure: z.boolean().optional() });

const ruleCustomOverrideSchema = z.object({
  name: z.string(),
  overrideId: z.string(),
});

const ruleVariableSchema = z.object({
  name: z.string(),
  description: z.string().nullable().optional(),
  hidden: z.boolean(),
  sensitive: z.boolean(),
  value: z.string().nullable(),
});

const ruleFields = {
  advancedOverride: z.string().optional(),
  behaviors: z.array(ruleBehaviorSchema).optional(),
  comments: z.string().optional(),
  criteria: z.array(ruleBehaviorSchema).optional(),
  criteriaLocked: z.boolean().optional(),
  criteriaMustSatisfy: z.enum(RULE_CRITERIA_MUST_SATISFY).optional(),
  options: ruleOptionsSchema.optional(),
  uuid: z.string().optional(),
  templateUuid: z.string().optional(),
  templateLink: z.string().optional(),
};

export const rulesSchema: z.ZodType<Rules> = z.lazy(() =>
  z.object({
    ...ruleFields,
    name: z.string(),
    children: z.array(rulesSchema).optional(),
    customOverride: ruleCustomOverrideSchema.optional(),
    variables: z.array(ruleVariableSchema).optional(),
  })
);

// =============================================================================
// Request schemas
// =============================================================================

const ruleCustomOverrideRequestSchema = z.object({
  name: requiredString(),
  overrideId: requiredString(),
});

const ruleVariableRequestSchema = ruleVariableSchema.extend({
  name: requiredString(),
  value: presentString(),
});

export const rulesRequestSchema: z.ZodType<Rules> = z.lazy(() =>
  z.object({
    ...ruleFields,
    criteriaMustSatisfy: oneOf(RULE_CRITERIA_MUST_SATISFY).optional(),
    name: requiredString(),
    children: z.array(rulesRequestSchema).optional(),
    customOverride: ruleCustomOverrideRequestSchema.optional(),
    variables: z.array(ruleVariableRequestSchema).optional(),
  })
);

export const getRuleTreeRequestSchema = z.object({
  propertyId: requiredString(),
  propertyVersion: requiredInt(),
  contractId: z.string().optional(),
  groupId: z.string().optional(),
  validateMode: oneOf(RULE_VALIDATE_MODES).optional(),
  validateRules: z.boolean().optional(),
  ruleFormat: matching(RULE_FORMAT_PATTERN).optional(),
});

export type GetRuleTreeRequest = z.input<typeof getRuleTreeRequestSchema>;

export const updateRulesRequestSchema = z.object({
  propertyId: requiredString(),
  propertyVersion: requiredInt(),
  contractId: z.string().optional(),
  groupId: z.string().optional(),
  dryRun: z.boolean().optional(),
  validateMode: oneOf(RULE_VALIDATE_MODES).optional(),
  validateRules: z.boolean().optional(),
  rules: z.object({
    comments: z.string().optional(),
    rules: rulesRequestSchema,
  }),
});

export type UpdateRulesRequest = {
  propertyId: string;
  propertyVersion: number;
  contractId?: string;
  groupId?: string;
  dryRun?: boolean;
  validateMode?: RuleValidateMode;
  validateRules?: boolean;
  rules: RulesUpdate;
};

// =============================================================================
// Response schemas
// =============================================================================

export const getRuleTreeResponseSchema = papiResponseSchema.extend({
  propertyId: z.string(),
  propertyVersion: z.number().int(),
  etag: z.string(),
  ruleFormat: z.string(),
  rules: rulesSchema,
  comments: z.string().optional(),
});

export type GetRuleTreeResponse = z.infer<typeof getRuleTreeResponseSchema>;

const ruleWarningSchema = papiProblemSchema.extend({
  currentRuleFormat: z.string().optional(),
  suggestedRuleFormat: z.string().optional(),
});

export const updateRulesResponseSchema = z.object({
  accountId: z.string(),
  contractId: z.string(),
  groupId: z.string(),
  propertyId: z.string(),
  propertyVersion: z.number().int(),
  etag: z.string(),
  ruleFormat: z.string(),
  rules: rulesSchema,
  comments: z.string().optional(),
  errors: z.array(papiProblemSchema).optional(),
  warnings: z.array(ruleWarningSchema).optional(),
});

export type UpdateRulesResponse = z.infer<typeof updateRulesResponseSchema>;

// =============================================================================
// Operations
// =============================================================================

/** Media type that pins the rule tree to one rule format */
export function ruleFormatMediaType(ruleFormat: string): string {
  return `application/vnd.akamai.papirules.${ruleFormat}+json`;
}

function ruleTreeQuery(params: {
  contractId?: string;
  groupId?: string;
  validateMode?: RuleValidateMode;
  validateRules?: boolean;
}) {
  return {
    contractId: params.contractId || undefined,
    groupId: params.groupId || undefined,
    validateMode: params.validateMode,
    // The API validates unless told otherwise
    validateRules: params.validateRules ? undefined : false,
  };
}

/**
 * Fetch the rule tree of one property version.
 */
export async function getRuleTree(
  papi: PapiClient,
  params: GetRuleTreeRequest,
  options?: CallOptions
): Promise<GetRuleTreeResponse> {
  return withOperation(RULE_TREE_OPERATIONS.getRuleTree, async () => {
    const invalid = validateRequest(getRuleTreeRequestSchema, params);
    if (invalid) {
      throw invalid;
    }
    papi.log(options).debug(`GET rule tree ${params.propertyId} v${params.propertyVersion}`);

    const response = await papi.exec(
      {
        method: "GET",
        path: API_ENDPOINTS.papi.ruleTree(params.propertyId, params.propertyVersion),
        query: ruleTreeQuery(params),
        headers: params.ruleFormat
          ? { [HEADERS.accept]: ruleFormatMediaType(params.ruleFormat) }
          : undefined,
        options,
      },
      getRuleTreeResponseSchema
    );
    if (response.status !== 200) {
      throw papi.error(response);
    }
    return expectData(response);
  });
}

/**
 * Replace the rule tree of one property version.
 */
export async function updateRuleTree(
  papi: PapiClient,
  params: UpdateRulesRequest,
  options?: CallOptions
): Promise<UpdateRulesResponse> {
  return withOperation(RULE_TREE_OPERATIONS.updateRuleTree, async () => {
    const invalid = validateRequest(updateRulesRequestSchema, params);
    if (invalid) {
      throw invalid;
    }
    papi.log(options).debug(`PUT rule tree ${params.propertyId} v${params.propertyVersion}`);

    const response = await papi.exec(
      {
        method: "PUT",
        path: API_ENDPOINTS.papi.ruleTree(params.propertyId, params.propertyVersion),
        query: {
          ...ruleTreeQuery(params),
          dryRun: params.dryRun ? true : undefined,
        },
        options,
      },
      updateRulesResponseSchema,
      params.rules
    );
    if (response.status !== 200) {
      throw papi.error(response);
    }
    return expectData(response);
  });
}
