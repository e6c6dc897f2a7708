/**
 * Branch comparison and merging. Everything here is a pure function over
 * branch results; branch status changes belong to the coordinator.
 *
 * A branch's edit of a file is reduced to one line region relative to the
 * baseline: the span between the longest common prefix and suffix. Two
 * edits conflict when their regions overlap (or both insert at the same
 * line) and their contents differ.
 */

import { MergeConflictError, type ConflictDescriptor } from '../../core/errors.js'
import type { Artifact, BranchId } from '../../core/types.js'
import type {
  Baseline,
  BranchComparison,
  BranchEvaluation,
  ConflictResolver,
  FileConflict,
  ImplementationBranch,
  MergeResult,
  MergedFile,
} from './types.js'

export interface MergeCandidate {
  branch: ImplementationBranch
  evaluation: BranchEvaluation
}

// ---------------------------------------------------------------------------
// Line regions
// ---------------------------------------------------------------------------

export interface EditRegion {
  /** First replaced baseline line */
  start: number
  /** One past the last replaced baseline line; equal to start for an insertion */
  end: number
  /** Replacement lines */
  lines: string[]
}

/** The single region in which `changed` differs from `base`, or null if equal */
export function diffRegion(base: string, changed: string): EditRegion | null {
  if (base === changed) return null
  const a = base.split('\n')
  const b = changed.split('\n')

  let prefix = 0
  while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) prefix++

  let suffix = 0
  while (
    suffix < a.length - prefix &&
    suffix < b.length - prefix &&
    a[a.length - 1 - suffix] === b[b.length - 1 - suffix]
  ) {
    suffix++
  }

  return { start: prefix, end: a.length - suffix, lines: b.slice(prefix, b.length - suffix) }
}

export function regionsOverlap(x: EditRegion, y: EditRegion): boolean {
  return x.start === y.start || (x.start < y.end && y.start < x.end)
}

function sameRegion(x: EditRegion, y: EditRegion): boolean {
  return x.start === y.start && x.end === y.end && x.lines.join('\n') === y.lines.join('\n')
}

/** Apply non-overlapping regions to `base` */
export function applyRegions(base: string, regions: readonly EditRegion[]): string {
  const lines = base.split('\n')
  const out: string[] = []
  let cursor = 0
  for (const region of [...regions].sort((x, y) => x.start - y.start)) {
    out.push(...lines.slice(cursor, region.start), ...region.lines)
    cursor = region.end
  }
  out.push(...lines.slice(cursor))
  return out.join('\n')
}

// ---------------------------------------------------------------------------
// Comparison
// ---------------------------------------------------------------------------

function filesOf(branch: ImplementationBranch): Map<string, Artifact> {
  const files = new Map<string, Artifact>()
  for (const artifact of branch.report?.artifacts ?? []) files.set(artifact.path, artifact)
  return files
}

/** Common, unique and conflicting file changes of two branches */
export function compareBranches(a: ImplementationBranch, b: ImplementationBranch): BranchComparison {
  const filesA = filesOf(a)
  const filesB = filesOf(b)
  const comparison: BranchComparison = {
    branchA: a.id,
    branchB: b.id,
    common: [],
    uniqueToA: [],
    uniqueToB: [],
    conflicts: [],
  }

  for (const [path, artifactA] of filesA) {
    const artifactB = filesB.get(path)
    if (artifactB === undefined) comparison.uniqueToA.push(artifactA)
    else if (artifactA.content === artifactB.content) comparison.common.push(artifactA)
    else comparison.conflicts.push({ path, a: artifactA, b: artifactB })
  }
  for (const [path, artifactB] of filesB) {
    if (!filesA.has(path)) comparison.uniqueToB.push(artifactB)
  }
  return comparison
}

// ---------------------------------------------------------------------------
// Single-branch merge
// ---------------------------------------------------------------------------

/** Adopt one branch wholesale */
export function mergeSingle(winner: ImplementationBranch): MergeResult {
  const files: MergedFile[] = [...filesOf(winner).values()].map((artifact) => ({
    path: artifact.path,
    content: artifact.content,
    source: winner.id,
    contributors: [],
  }))
  return { mode: 'single', selected: [winner.id], files, resolvedConflicts: [] }
}

// ---------------------------------------------------------------------------
// Selective merge
// ---------------------------------------------------------------------------

function compareForPath(path: string): (x: MergeCandidate, y: MergeCandidate) => number {
  return (x, y) => {
    const component = (y.evaluation.components[path] ?? 0) - (x.evaluation.components[path] ?? 0)
    if (component !== 0) return component
    const overall = y.evaluation.metrics.overallScore - x.evaluation.metrics.overallScore
    if (overall !== 0) return overall
    return x.branch.id < y.branch.id ? -1 : x.branch.id > y.branch.id ? 1 : 0
  }
}

/**
 * Per file, adopt the version of the branch with the best component score,
 * then fold in other branches' edits that do not overlap it. Overlapping
 * edits go to `resolver`.
 *
 * @throws {MergeConflictError} when any conflict is left unresolved
 */
export function mergeSelective(
  candidates: readonly MergeCandidate[],
  baseline: Baseline,
  resolver?: ConflictResolver,
): MergeResult {
  const contents = new Map<BranchId, Map<string, Artifact>>()
  const paths: string[] = []
  for (const candidate of candidates) {
    const files = filesOf(candidate.branch)
    contents.set(candidate.branch.id, files)
    for (const path of files.keys()) if (!paths.includes(path)) paths.push(path)
  }
  paths.sort()

  const files: MergedFile[] = []
  const resolvedConflicts: FileConflict[] = []
  const unresolved: ConflictDescriptor[] = []
  const retained = new Set<BranchId>()

  for (const path of paths) {
    const ranked = candidates
      .filter((c) => contents.get(c.branch.id)?.has(path) === true)
      .sort(compareForPath(path))
    const [owner, ...others] = ranked
    if (owner === undefined) continue

    const ownerId = owner.branch.id
    const base = baseline[path] ?? null
    let current = contents.get(ownerId)?.get(path)?.content ?? ''
    const applied: EditRegion[] = []
    let wholeFile = base === null
    if (base !== null) {
      const region = diffRegion(base, current)
      if (region !== null) applied.push(region)
    }

    const contributors: BranchId[] = []
    for (const other of others) {
      const otherId = other.branch.id
      const theirs = contents.get(otherId)?.get(path)?.content ?? ''
      if (theirs === current) continue

      if (!wholeFile && base !== null) {
        const region = diffRegion(base, theirs)
        if (region === null || applied.some((r) => sameRegion(r, region))) continue
        if (applied.every((r) => !regionsOverlap(r, region))) {
          applied.push(region)
          current = applyRegions(base, applied)
          contributors.push(otherId)
          continue
        }
      }

      const conflict: FileConflict = {
        path,
        base,
        ours: { branchId: ownerId, content: current },
        theirs: { branchId: otherId, content: theirs },
      }
      const resolved = resolver?.(conflict) ?? null
      if (resolved === null) {
        unresolved.push({ path, branchA: ownerId, branchB: otherId })
        continue
      }
      current = resolved
      wholeFile = true
      contributors.push(otherId)
      resolvedConflicts.push(conflict)
    }

    retained.add(ownerId)
    for (const id of contributors) retained.add(id)
    files.push({ path, content: current, source: ownerId, contributors })
  }

  if (unresolved.length > 0) throw new MergeConflictError(unresolved)

  const selected = candidates.map((c) => c.branch.id).filter((id) => retained.has(id))
  return { mode: 'selective', selected, files, resolvedConflicts }
}
