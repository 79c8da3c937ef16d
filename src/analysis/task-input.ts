import { z } from "zod";
import { TaskDescriptorError } from "./errors.js";
import type { TaskDescriptor } from "./types.js";

const keywordList = z.array(z.string()).default([]);

export const taskInputSchema = z.object({
  challenge_info: z.record(z.unknown()).optional(),
  documents: z
    .array(
      z.object({
        filename: z.string().min(1),
        title: z.string().optional(),
      }),
    )
    .default([]),
  persona: z.object({
    role: z.string().trim().min(1, "persona role is required"),
  }),
  job_to_be_done: z.object({
    task: z.string().trim().min(1, "task is required"),
    constraints: z
      .object({
        include_keywords: keywordList,
        exclude_keywords: keywordList,
      })
      .default({}),
  }),
});

export type TaskInput = z.infer<typeof taskInputSchema>;

export function parseTaskInput(raw: unknown): TaskInput {
  const result = taskInputSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new TaskDescriptorError(`Invalid task input: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

export function toTaskDescriptor(input: TaskInput): TaskDescriptor {
  return Object.freeze({
    role: input.persona.role,
    task: input.job_to_be_done.task,
    includeKeywords: input.job_to_be_done.constraints.include_keywords,
    excludeKeywords: input.job_to_be_done.constraints.exclude_keywords,
  });
}
