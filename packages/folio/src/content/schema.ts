import { type Static, Type } from "@sinclair/typebox";

export const ProjectSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  description: Type.String(),
  technologies: Type.Array(Type.String()),
  features: Type.Array(Type.String()),
  status: Type.String(),
  url: Type.Optional(Type.String()),
});

export const ProjectListSchema = Type.Array(ProjectSchema);

/** Shape of a post in the bundled fallback dataset. */
export const BundledPostSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  title: Type.String(),
  summary: Type.String(),
  date: Type.String({ pattern: "^\\d{4}-\\d{2}-\\d{2}$" }),
  body: Type.String(),
});

export const BundledPostListSchema = Type.Array(BundledPostSchema, { minItems: 1 });

export type BundledPost = Static<typeof BundledPostSchema>;
