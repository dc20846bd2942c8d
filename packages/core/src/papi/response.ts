import { z } from "zod";

/** Problem entry inside an otherwise successful PAPI response */
export const papiProblemSchema = z.object({
  type: z.string().optional(),
  title: z.string().optional(),
  detail: z.string().optional(),
  instance: z.string().optional(),
  behaviorName: z.string().optional(),
  errorLocation: z.string().optional(),
});

export type PapiProblem = z.infer<typeof papiProblemSchema>;

/** Fields most PAPI responses share */
export const papiResponseSchema = z.object({
  accountId: z.string().optional(),
  contractId: z.string().optional(),
  groupId: z.string().optional(),
  etag: z.string().optional(),
  errors: z.array(papiProblemSchema).optional(),
  warnings: z.array(papiProblemSchema).optional(),
});
