import { z } from "zod";

export const SectionMetaSchema = z.object({
  id: z.string(),
  text: z.string()
});

export const RawTableSnapshotSchema = z.object({
  caption: z.string(),
  headers: z.array(z.string()),
  rows: z.array(z.array(z.string())),
  section: SectionMetaSchema.nullable()
});

export const TableSnapshotFileSchema = z.object({
  schema_version: z.literal("1.0"),
  source_url: z.string().min(1),
  captured_at: z.string().min(1),
  tables: z.array(RawTableSnapshotSchema)
});

export type TableSnapshotFile = z.infer<typeof TableSnapshotFileSchema>;
