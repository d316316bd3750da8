import { describe, expect, it } from "vitest";
import { z } from "zod";

import { formatZodIssues } from "./validation";

describe("formatZodIssues", () => {
  it("prefixes each issue with its dotted path", () => {
    const parsed = z.object({ budget: z.object({ normal: z.number() }) }).safeParse({ budget: { normal: "x" } });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(formatZodIssues(parsed.error)).toEqual(["budget.normal: Expected number, received string"]);
    }
  });

  it("labels issues on the input itself as root", () => {
    const parsed = z.string().safeParse(4);
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(formatZodIssues(parsed.error)).toEqual(["root: Expected string, received number"]);
    }
  });
});
