// Input validation for every CLI action. Schemas are zod; failures are flattened into
// a single VALIDATION_FAILED PamError that names each offending field.
import { z } from "zod";
import { RULE_TYPES, CONTROL_KEYWORDS } from "../types/rule.js";
import type { Rule } from "../types/rule.js";
import { PamError, PamErrorCode } from "../shared/errors.js";
import { tokenize } from "./parser.js";

const CONTROL_ACTION = /^(ignore|bad|die|ok|done|reset|[1-9][0-9]*)$/;
const CONTROL_VALUE = /^[a-z_]+$/;

/** True for `required`-style keywords and well-formed `[value=action ...]` lists. */
export function isValidControl(control: string): boolean {
  if ((CONTROL_KEYWORDS as readonly string[]).includes(control)) return true;
  if (!control.startsWith("[") || !control.endsWith("]")) return false;

  const pairs = control.slice(1, -1).trim().split(/\s+/);
  if (pairs.length === 0 || pairs[0] === "") return false;
  return pairs.every((pair) => {
    const [value, action, ...rest] = pair.split("=");
    return rest.length === 0 && value !== undefined && action !== undefined && CONTROL_VALUE.test(value) && CONTROL_ACTION.test(action);
  });
}

export const ServiceNameSchema = z
  .string({ required_error: "--service is required" })
  .min(1, "service name must not be empty")
  .refine((name) => !name.includes("/") && !name.includes("\0"), "service name must not contain a path separator")
  .refine((name) => !name.startsWith("."), "service name must not start with '.'");

export const RuleTypeSchema = z.enum(RULE_TYPES, {
  errorMap: () => ({ message: `type must be one of ${RULE_TYPES.join(", ")}` }),
});

// `#` starts a comment in a service file, so no written field may contain one.
export const ControlSchema = z
  .string({ required_error: "--control is required" })
  .refine((control) => !control.includes("#"), "control must not contain '#'")
  .refine(isValidControl, (control) => ({ message: `unknown control "${control}"` }));

export const ModuleSchema = z
  .string({ required_error: "--module is required" })
  .min(1, "module must not be empty")
  .refine((module) => !/\s/.test(module), "module must not contain whitespace")
  .refine((module) => !module.includes("#"), "module must not contain '#'");

export const PositionSchema = z.enum(["start", "end"]).default("end");

export const ShowInputSchema = z.object({ service: ServiceNameSchema });

export const AddInputSchema = z.object({
  service: ServiceNameSchema,
  type: RuleTypeSchema,
  control: ControlSchema,
  module: ModuleSchema,
  args: z
    .string()
    .refine((args) => !args.includes("#"), "args must not contain '#'")
    .optional(),
  position: PositionSchema,
});

export const RemoveInputSchema = z.object({
  service: ServiceNameSchema,
  module: ModuleSchema,
});

export type ShowInput = z.infer<typeof ShowInputSchema>;
export type AddInput = z.infer<typeof AddInputSchema>;
export type RemoveInput = z.infer<typeof RemoveInputSchema>;

/** Parse `input` against `schema`, throwing VALIDATION_FAILED with every issue listed. */
export function validateInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) => {
    const field = issue.path.join(".");
    return field ? `${field}: ${issue.message}` : issue.message;
  });
  throw new PamError(PamErrorCode.VALIDATION_FAILED, issues.join("; "), { issues });
}

/** Build the Rule an `add` writes. `--args` is split like a rule line, brackets kept whole. */
export function ruleFromInput(input: AddInput): Rule {
  return {
    type: input.type,
    control: input.control,
    module: input.module,
    args: input.args ? tokenize(input.args) : [],
  };
}
