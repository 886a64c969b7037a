import { readFile } from "fs/promises";
import { z } from "zod";
import type { SierraProgram } from "../types/sierra";
import { ProgramLoadError, formatIssues } from "../utils/errors";

const IdSchema = z.object({
  id: z.number().int().nonnegative(),
  debugName: z.string().optional()
});

const BranchSchema = z.object({
  target: z.union([z.literal("fallthrough"), z.number().int().nonnegative()]),
  results: z.array(z.number().int())
});

const StatementSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("invocation"),
    invocation: z.object({
      libfuncId: z.number().int().nonnegative(),
      args: z.array(z.number().int()),
      branches: z.array(BranchSchema)
    })
  }),
  z.object({
    kind: z.literal("return"),
    vars: z.array(z.number().int())
  })
]);

const GenericArgSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("userFunc"), function: IdSchema }),
  z.object({ kind: z.literal("type"), type: IdSchema }),
  z.object({ kind: z.literal("value"), value: z.string() })
]);

const NameListSchema = z.array(z.string()).optional();

export const SierraProgramSchema: z.ZodType<SierraProgram, z.ZodTypeDef, unknown> = z.object({
  libfuncDeclarations: z.array(
    z.object({
      id: z.number().int().nonnegative(),
      debugName: z.string().optional(),
      genericId: z.string(),
      genericArgs: z.array(GenericArgSchema).optional()
    })
  ),
  statements: z.array(StatementSchema),
  funcs: z.array(
    z.object({
      id: IdSchema,
      signature: z.object({
        paramTypes: z.array(IdSchema),
        retTypes: z.array(IdSchema)
      }),
      params: z.array(z.object({ id: z.number().int(), ty: IdSchema })),
      entryPoint: z.number().int().nonnegative()
    })
  ),
  abi: z
    .object({
      external: NameListSchema,
      view: NameListSchema,
      constructors: NameListSchema,
      l1Handler: NameListSchema,
      event: NameListSchema
    })
    .optional()
});

export function parseProgram(input: unknown): SierraProgram {
  const parsed = SierraProgramSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.issues);
    throw new ProgramLoadError(`Invalid Sierra program: ${issues.slice(0, 5).join("; ")}`, issues);
  }
  return parsed.data;
}

export async function loadProgramFromFile(path: string): Promise<SierraProgram> {
  const raw = await readFile(path, "utf-8");

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ProgramLoadError(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  return parseProgram(json);
}
