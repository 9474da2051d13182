// ---------------------------------------------------------------------------
// Project Types – a sketch on disk plus the board it targets
// ---------------------------------------------------------------------------

import { Type, type Static } from "@sinclair/typebox";

export const ProjectSchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  /** Sketch folder; the toolchain requires it to share the sketch's name. */
  dir: Type.String(),
  sketchPath: Type.String(),
  boardName: Type.String(),
  createdAtMs: Type.Number(),
  updatedAtMs: Type.Number(),
});

export type Project = Static<typeof ProjectSchema>;

export const ProjectStoreFileSchema = Type.Object({
  version: Type.Literal(1),
  projects: Type.Array(ProjectSchema),
});

export type ProjectStoreFile = Static<typeof ProjectStoreFileSchema>;

export type ProjectCreateInput = {
  name: string;
  parentDir: string;
  boardName: string;
};
