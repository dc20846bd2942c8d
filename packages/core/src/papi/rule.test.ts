import { describe, expect, it } from "vitest";
import { isNotFoundError, UnmarshalingError } from "../errors";
import { isValidationError } from "../validation";
import { createSession } from "../session/session";
import { createMockFetch, jsonResponse, type MockReply } from "../test-utils/fetch";
import { createCountingSigner, TEST_HOST } from "../test-utils/signer";
import { PapiClient } from "./client";
import { getRuleTree, type Rules, updateRuleTree } from "./rule";

function setup(replies: MockReply[]) {
  const { fetch, calls } = createMockFetch(replies);
  const session = createSession({ signer: createCountingSigner().signer, fetch });
  return { papi: new PapiClient(session), calls };
}

const RULES: Rules = {
  name: "default",
  criteriaMustSatisfy: "all",
  options: { is_secure: true },
  behaviors: [
    {
      name: "origin",
      options: {
        hostname: "origin.example.test",
        httpPort: 80,
        forwardHostHeader: "REQUEST_HOST_HEADER",
        customCertificates: [],
        nested: { verify: { enabled: true } },
      },
    },
  ],
  variables: [
    { name: "PMUSER_ABSENT", hidden: false, sensitive: false, value: "a" },
    { name: "PMUSER_NULL", description: null, hidden: true, sensitive: false, value: "" },
    { name: "PMUSER_EMPTY", description: "", hidden: false, sensitive: true, value: "c" },
  ],
  children: [
    {
      name: "Static content",
      criteria: [{ name: "fileExtension", options: { values: ["css", "js"] } }],
      behaviors: [{ name: "caching", options: { behavior: "MAX_AGE", ttl: "1d" } }],
      customOverride: { name: "test-override", overrideId: "cbo_1" },
    },
  ],
};

function ruleTreeBody(rules: Rules) {
  return {
    accountId: "act_1",
    contractId: "ctr_1",
    groupId: "grp_1",
    propertyId: "prp_1",
    propertyVersion: 3,
    etag: "etag-1",
    ruleFormat: "v2023-01-05",
    rules,
  };
}

describe("getRuleTree", () => {
  it("requests the rule tree with the expected query and headers", async () => {
    const { papi, calls } = setup([jsonResponse(200, ruleTreeBody(RULES))]);

    const result = await getRuleTree(papi, {
      propertyId: "prp_1",
      propertyVersion: 3,
      contractId: "ctr_1",
      groupId: "grp_1",
      validateMode: "fast",
      ruleFormat: "v2023-01-05",
    });

    expect(result.rules).toEqual(RULES);
    expect(result.etag).toBe("etag-1");
    expect(calls[0]?.method).toBe("GET");
    expect(calls[0]?.url).toBe(
      `https://${TEST_HOST}/papi/v1/properties/prp_1/versions/3/rules` +
        "?contractId=ctr_1&groupId=grp_1&validateMode=fast&validateRules=false"
    );
    expect(calls[0]?.headers.get("Accept")).toBe(
      "application/vnd.akamai.papirules.v2023-01-05+json"
    );
    expect(calls[0]?.headers.get("PAPI-Use-Prefixes")).toBe("true");
  });

  it("omits validateRules when rules should be validated", async () => {
    const { papi, calls } = setup([jsonResponse(200, ruleTreeBody(RULES))]);

    await getRuleTree(papi, { propertyId: "prp_1", propertyVersion: 3, validateRules: true });

    expect(calls[0]?.url).toBe(
      `https://${TEST_HOST}/papi/v1/properties/prp_1/versions/3/rules`
    );
    expect(calls[0]?.headers.get("Accept")).toBe("application/json");
  });

  it("sends the prefix header as configured", async () => {
    const { fetch, calls } = createMockFetch([jsonResponse(200, ruleTreeBody(RULES))]);
    const session = createSession({ signer: createCountingSigner().signer, fetch });

    await getRuleTree(new PapiClient(session, { usePrefixes: false }), {
      propertyId: "175780",
      propertyVersion: 3,
    });

    expect(calls[0]?.headers.get("PAPI-Use-Prefixes")).toBe("false");
  });

  it("validates parameters before sending anything", async () => {
    const { papi, calls } = setup([]);

    const error = await getRuleTree(papi, {
      propertyId: "",
      propertyVersion: 0,
      ruleFormat: "v2023",
    }).catch((e: unknown) => e);

    expect(isValidationError(error)).toBe(true);
    expect(error instanceof Error && error.message).toBe(
      "fetching rule tree: struct validation:\n" +
        "propertyId: cannot be blank\n" +
        "propertyVersion: cannot be blank\n" +
        "ruleFormat: must be in a valid format"
    );
    expect(calls).toHaveLength(0);
  });

  it("maps a 404 to a not-found API error", async () => {
    const { papi } = setup([
      jsonResponse(404, {
        type: "https://problems.example.test/not-found",
        title: "Not Found",
        detail: "Property version not found",
      }),
    ]);

    const error = await getRuleTree(papi, { propertyId: "prp_1", propertyVersion: 9 }).catch(
      (e: unknown) => e
    );

    expect(isNotFoundError(error)).toBe(true);
    expect(error instanceof Error && error.message.startsWith("fetching rule tree: API error:")).toBe(
      true
    );
  });

  it("reports a body that does not match the rule tree shape", async () => {
    const { papi } = setup([jsonResponse(200, { rules: "nope" })]);

    const error = await getRuleTree(papi, { propertyId: "prp_1", propertyVersion: 1 }).catch(
      (e: unknown) => e
    );

    expect(error instanceof Error && error.cause).toBeInstanceOf(UnmarshalingError);
  });
});

describe("updateRuleTree", () => {
  it("sends the rules as the PUT body", async () => {
    const { papi, calls } = setup([jsonResponse(200, ruleTreeBody(RULES))]);

    const result = await updateRuleTree(papi, {
      propertyId: "prp_1",
      propertyVersion: 3,
      contractId: "ctr_1",
      groupId: "grp_1",
      dryRun: true,
      validateRules: true,
      rules: { comments: "test change", rules: RULES },
    });

    expect(calls[0]?.method).toBe("PUT");
    expect(calls[0]?.url).toBe(
      `https://${TEST_HOST}/papi/v1/properties/prp_1/versions/3/rules` +
        "?contractId=ctr_1&dryRun=true&groupId=grp_1"
    );
    expect(calls[0]?.body).toBe(JSON.stringify({ comments: "test change", rules: RULES }));
    expect(result.rules).toEqual(RULES);
  });

  it("keeps absent, null and empty variable descriptions apart", async () => {
    const { papi, calls } = setup([
      (call) => {
        const sent: unknown = JSON.parse(call.body ?? "{}");
        const rules =
          typeof sent === "object" && sent !== null && "rules" in sent ? sent.rules : undefined;
        return jsonResponse(200, { ...ruleTreeBody(RULES), rules });
      },
    ]);

    const result = await updateRuleTree(papi, {
      propertyId: "prp_1",
      propertyVersion: 3,
      rules: { rules: RULES },
    });

    const variables = result.rules.variables ?? [];
    expect("description" in (variables[0] ?? {})).toBe(false);
    expect(variables[1]?.description).toBeNull();
    expect(variables[2]?.description).toBe("");
    expect(calls[0]?.body).toContain('"description":null');
  });

  it("reports every nested violation in one error", async () => {
    const { papi, calls } = setup([]);
    const invalid: Rules = {
      name: "default",
      customOverride: { name: "test-override", overrideId: "" },
      variables: [
        { name: "PMUSER_OK", hidden: false, sensitive: false, value: "x" },
        { name: "PMUSER_MISSING", hidden: false, sensitive: false, value: null },
      ],
      children: [{ name: "" }],
    };

    const error = await updateRuleTree(papi, {
      propertyId: "prp_1",
      propertyVersion: 3,
      rules: { rules: invalid },
    }).catch((e: unknown) => e);

    expect(error instanceof Error && error.message).toBe(
      "updating rule tree: struct validation:\n" +
        "rules.rules.children[0].name: cannot be blank\n" +
        "rules.rules.customOverride.overrideId: cannot be blank\n" +
        "rules.rules.variables[1].value: is required"
    );
    expect(calls).toHaveLength(0);
  });
});
