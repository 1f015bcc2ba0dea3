import {
  ImportEdgeSchema,
  RepoIndexFileSchema,
  type ImportEdge,
  type RepoIndex,
} from "@archlens/shared";

export type DependencyRecord = {
  resolvedInternal: ReadonlySet<string>;
  importEdges: readonly ImportEdge[];
  flags: ReadonlySet<string>;
  language: string | null;
  topLevelDefs: readonly string[];
  internalUnresolvedSpecs: readonly string[];
};

export type DependencyMap = ReadonlyMap<string, DependencyRecord>;

/**
 * Per-file dependency records derived from the repo index. Records without a
 * path, or whose deps block is not an object, are skipped. Only internal,
 * resolved edges survive; a later record for the same path replaces an earlier one.
 */
export function extractDependencies(repoIndex: RepoIndex): DependencyMap {
  const byPath = new Map<string, DependencyRecord>();

  for (const raw of repoIndex.files) {
    const parsed = RepoIndexFileSchema.safeParse(raw);
    if (!parsed.success) continue;
    const file = parsed.data;

    const importEdges: ImportEdge[] = [];
    const resolvedInternal = new Set<string>();
    for (const candidate of file.deps.import_edges) {
      const edge = ImportEdgeSchema.safeParse(candidate);
      if (!edge.success) continue;
      importEdges.push(edge.data);
      resolvedInternal.add(edge.data.resolved_path);
    }

    byPath.set(file.path, {
      resolvedInternal,
      importEdges,
      flags: new Set(file.flags),
      language: file.language ?? null,
      topLevelDefs: file.top_level_defs,
      internalUnresolvedSpecs: file.deps.internal_unresolved_specs,
    });
  }

  return byPath;
}
