import { z } from "zod";

const commitSchema = z.object({
  time: z.string().optional(),
  data: z
    .object({
      t: z.number().int().nonnegative().optional(),
      size: z.number().nonnegative().optional(),
    })
    .optional(),
});

/**
 * A ledger descriptor as the server writes it. Only `ledgerAlias` is
 * required; commit details fall back to zero/null when absent.
 */
export const ledgerDescriptorSchema = z
  .object({
    ledgerAlias: z.string().min(1),
    branches: z.array(z.object({ commit: commitSchema.optional() }).passthrough()).optional(),
  })
  .passthrough();

export type LedgerDescriptor = z.infer<typeof ledgerDescriptorSchema>;

export interface LedgerSummary {
  name: string;
  commitCount: number;
  sizeBytes: number;
  /** Time of the latest commit on the first branch, as written by the server. */
  lastUpdated: string | null;
  descriptorPath: string;
}

export interface LedgerDetail {
  summary: LedgerSummary;
  document: LedgerDescriptor;
}

export type DescriptorParseResult = { ok: true; detail: LedgerDetail } | { ok: false; reason: string };

export function parseDescriptor(descriptorPath: string, content: string): DescriptorParseResult {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err) {
    return { ok: false, reason: `not JSON (${err instanceof Error ? err.message : String(err)})` };
  }

  const parsed = ledgerDescriptorSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, reason: issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "schema mismatch" };
  }

  const document = parsed.data;
  const commit = document.branches?.[0]?.commit;
  return {
    ok: true,
    detail: {
      summary: {
        name: document.ledgerAlias,
        commitCount: commit?.data?.t ?? 0,
        sizeBytes: commit?.data?.size ?? 0,
        lastUpdated: commit?.time ?? null,
        descriptorPath,
      },
      document,
    },
  };
}

/** `find` output to a list of paths. */
export function splitPaths(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
