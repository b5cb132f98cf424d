import { z } from "zod";

// ---------------------------------------------------------------------------
// Zod Schemas (wire format)
// ---------------------------------------------------------------------------

const GistFileSchema = z.object({
  filename: z.string().optional(),
  type: z.string().optional(),
  language: z.string().nullable().optional(),
  raw_url: z.string().url(),
  size: z.number().int().nonnegative(),
});

const GistSchema = z.object({
  id: z.string().min(1),
  description: z.string().nullable().optional(),
  files: z.record(z.string(), GistFileSchema),
  public: z.boolean().optional(),
  created_at: z.string(),
  updated_at: z.string(),
  html_url: z.string().optional(),
});

/** One page of `GET /users/{user}/gists` */
export const GistPageSchema = z.array(GistSchema);

type GistWire = z.infer<typeof GistSchema>;

// ---------------------------------------------------------------------------
// Domain Types
// ---------------------------------------------------------------------------

export interface GistFileMeta {
  name: string;
  size: number;
  rawUrl: string;
  language: string | null;
  type: string | null;
}

export interface GistSummary {
  id: string;
  description: string | null;
  /** In the order the API listed them */
  files: readonly GistFileMeta[];
  public: boolean;
  createdAt: string;
  updatedAt: string;
  htmlUrl: string | null;
}

// ---------------------------------------------------------------------------
// Mapping
// ---------------------------------------------------------------------------

function toSummary(wire: GistWire): GistSummary {
  return Object.freeze({
    id: wire.id,
    description: wire.description ?? null,
    files: Object.freeze(
      Object.entries(wire.files).map(([key, file]) =>
        Object.freeze({
          name: file.filename ?? key,
          size: file.size,
          rawUrl: file.raw_url,
          language: file.language ?? null,
          type: file.type ?? null,
        })
      )
    ),
    public: wire.public ?? true,
    createdAt: wire.created_at,
    updatedAt: wire.updated_at,
    htmlUrl: wire.html_url ?? null,
  });
}

export type DecodePageResult =
  | { success: true; gists: GistSummary[] }
  | { success: false; message: string };

/**
 * Validate a decoded JSON page and map it to summaries.
 */
export function decodeGistPage(data: unknown): DecodePageResult {
  const result = GistPageSchema.safeParse(data);
  if (!result.success) {
    const message = result.error.issues
      .slice(0, 3)
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    return { success: false, message };
  }
  return { success: true, gists: result.data.map(toSummary) };
}

export function countFiles(gists: readonly GistSummary[]): number {
  return gists.reduce((sum, gist) => sum + gist.files.length, 0);
}

/**
 * `id - description (file, file)` as shown by `list --plain` and in logs.
 */
export function formatGistLine(gist: GistSummary): string {
  const description = gist.description || "<no description>";
  const files = gist.files.map((f) => f.name).join(", ");
  return `${gist.id} - ${description} (${files})`;
}
