import { ZodIssueCode, z } from "zod";

// Turns a raw JSON string into a value before the wrapped schema sees it,
// reporting syntax errors as ordinary zod issues.
const parseJsonPreprocessor = (value: unknown, ctx: z.RefinementCtx) => {
  if (typeof value === "string") {
    try {
      return JSON.parse(value);
    } catch (e) {
      ctx.addIssue({
        code: ZodIssueCode.custom,
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }

  return value;
};

export function jsonParser<T extends z.ZodTypeAny>(input: T) {
  return z.preprocess(parseJsonPreprocessor, input);
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}
