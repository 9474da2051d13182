// ---------------------------------------------------------------------------
// Configuration Types – file schema (typebox) and resolved shape
// ---------------------------------------------------------------------------

import { Type, type Static } from "@sinclair/typebox";
import { LOG_LEVELS, type LogLevel } from "../logging.js";
import { optionalStringEnum } from "../schema/typebox.js";

const NonEmpty = Type.String({ minLength: 1 });

export const SketchforgeConfigSchema = Type.Object(
  {
    oracle: Type.Optional(
      Type.Object(
        {
          model: Type.Optional(NonEmpty),
          apiKey: Type.Optional(NonEmpty),
        },
        { additionalProperties: false },
      ),
    ),
    toolchain: Type.Optional(
      Type.Object(
        {
          cliPath: Type.Optional(NonEmpty),
          timeoutMs: Type.Optional(Type.Integer({ minimum: 1000 })),
        },
        { additionalProperties: false },
      ),
    ),
    libraries: Type.Optional(
      Type.Object(
        {
          downloadDir: Type.Optional(NonEmpty),
          hostingApiBase: Type.Optional(NonEmpty),
          archiveHost: Type.Optional(NonEmpty),
        },
        { additionalProperties: false },
      ),
    ),
    loop: Type.Optional(
      Type.Object(
        {
          retryBudget: Type.Optional(Type.Integer({ minimum: 1 })),
        },
        { additionalProperties: false },
      ),
    ),
    projects: Type.Optional(
      Type.Object({ store: Type.Optional(NonEmpty) }, { additionalProperties: false }),
    ),
    runs: Type.Optional(
      Type.Object({ dir: Type.Optional(NonEmpty) }, { additionalProperties: false }),
    ),
    logging: Type.Optional(
      Type.Object(
        {
          level: optionalStringEnum(LOG_LEVELS),
          file: Type.Optional(NonEmpty),
        },
        { additionalProperties: false },
      ),
    ),
  },
  { additionalProperties: false },
);

export type SketchforgeConfigFile = Static<typeof SketchforgeConfigSchema>;

export type SketchforgeConfig = {
  /** Where the configuration was read from (`null` when only defaults apply). */
  source: string | null;
  oracle: { model: string; apiKey?: string };
  toolchain: { cliPath: string; timeoutMs: number };
  libraries: { downloadDir: string; hostingApiBase: string; archiveHost: string };
  loop: { retryBudget: number };
  projects: { store: string };
  runs: { dir: string };
  logging: { level: LogLevel; file?: string };
};
