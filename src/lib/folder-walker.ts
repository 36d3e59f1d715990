import fs from "fs-extra";
import type { Dirent, Stats } from "node:fs";
import path from "node:path";
import type {
  AppendageType,
  FileUnit,
  FolderUnit,
  SequenceMember,
  SequenceUnit,
  TransferUnit,
} from "@/types";
import { DEFAULT_CONFIG } from "./config";
import { AmbiguousSequenceError, LocalIOError, type TransferError } from "./errors";

export interface WalkOptions {
  typeHint?: AppendageType;
  framePattern?: RegExp;
  minSequenceLength?: number;
  includeHidden?: boolean;
}

interface LocalFile {
  name: string;
  path: string;
  size: number;
}

interface FrameCandidate {
  file: LocalFile;
  prefix: string;
  frame: string;
  ext: string;
}

interface SequenceGroup {
  pattern: string;
  members: SequenceMember[];
}

interface GroupedFiles {
  singles: LocalFile[];
  sequences: SequenceGroup[];
  ambiguous: AmbiguousSequenceError[];
}

type Sibling =
  | { key: string; kind: "dir"; name: string; path: string }
  | { key: string; kind: "file"; file: LocalFile }
  | { key: string; kind: "sequence"; group: SequenceGroup };

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function joinRelative(dirRel: string, name: string): string {
  return dirRel === "" ? name : path.posix.join(dirRel, name);
}

function matchFrame(file: LocalFile, pattern: RegExp): FrameCandidate | null {
  const groups = pattern.exec(file.name)?.groups;
  if (!groups || groups.frame === undefined || groups.ext === undefined) return null;
  return { file, prefix: groups.prefix ?? "", frame: groups.frame, ext: groups.ext };
}

/**
 * Returns a reason string when the candidates cannot form one sequence.
 * Unpadded numbering (1, 2, ... 10) is consistent; padded numbering must
 * share one width.
 */
function inconsistency(candidates: FrameCandidate[]): string | null {
  if (new Set(candidates.map((c) => c.ext)).size > 1) {
    return "mixed extensions";
  }
  const padded = candidates.some((c) => c.frame.length > 1 && c.frame.startsWith("0"));
  if (padded && new Set(candidates.map((c) => c.frame.length)).size > 1) {
    return "inconsistent padding";
  }
  if (new Set(candidates.map((c) => Number(c.frame))).size !== candidates.length) {
    return "duplicate frame numbers";
  }
  return null;
}

function toSequence(candidates: FrameCandidate[]): SequenceGroup {
  const first = candidates[0];
  const padded = candidates.some((c) => c.frame.length > 1 && c.frame.startsWith("0"));
  const width = padded ? first.frame.length : 1;
  const members = candidates
    .map((c) => ({ name: c.file.name, path: c.file.path, size: c.file.size, frame: Number(c.frame) }))
    .sort((a, b) => a.frame - b.frame);
  return {
    pattern: `${first.prefix}${"#".repeat(width)}.${first.ext}`,
    members,
  };
}

function groupFrames(
  files: LocalFile[],
  directory: string,
  pattern: RegExp,
  minSequenceLength: number
): GroupedFiles {
  const result: GroupedFiles = { singles: [], sequences: [], ambiguous: [] };
  // one sequence per name prefix and extension
  const byPattern = new Map<string, FrameCandidate[]>();

  for (const file of files) {
    const candidate = matchFrame(file, pattern);
    if (!candidate) {
      result.singles.push(file);
      continue;
    }
    const key = `${candidate.prefix}\0${candidate.ext}`;
    const group = byPattern.get(key) ?? [];
    group.push(candidate);
    byPattern.set(key, group);
  }

  for (const candidates of byPattern.values()) {
    if (candidates.length < minSequenceLength) {
      result.singles.push(...candidates.map((c) => c.file));
      continue;
    }
    const reason = inconsistency(candidates);
    if (reason) {
      const names = candidates.map((c) => c.file.name).sort(compareNames);
      result.ambiguous.push(
        new AmbiguousSequenceError(
          `Frames "${candidates[0].prefix}*.${candidates[0].ext}" in ${directory} have ${reason}; treating them as separate files`,
          directory,
          names
        )
      );
      result.singles.push(...candidates.map((c) => c.file));
      continue;
    }
    result.sequences.push(toSequence(candidates));
  }

  return result;
}

async function statFile(filePath: string): Promise<LocalFile> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) {
      throw new LocalIOError(`Not a regular file: ${filePath}`, filePath);
    }
    return { name: path.basename(filePath), path: filePath, size: stats.size };
  } catch (err) {
    if (err instanceof LocalIOError) throw err;
    throw new LocalIOError(`File not found or unreadable: ${filePath}`, filePath, { cause: err });
  }
}

/**
 * Build one image sequence from an explicit list of frame files.
 * Throws AmbiguousSequenceError when the files do not share one pattern.
 */
export async function classifySequence(
  filePaths: string[],
  options: Pick<WalkOptions, "framePattern"> = {}
): Promise<SequenceUnit> {
  if (filePaths.length === 0) {
    throw new LocalIOError("An image sequence needs at least one frame file", "");
  }
  const pattern = options.framePattern ?? DEFAULT_CONFIG.framePattern;
  const files = await Promise.all(filePaths.map((p) => statFile(path.resolve(p))));
  const directory = path.dirname(files[0].path);

  const candidates: FrameCandidate[] = [];
  for (const file of files) {
    const candidate = matchFrame(file, pattern);
    if (!candidate) {
      throw new AmbiguousSequenceError(`"${file.name}" carries no frame number`, directory, [file.name]);
    }
    candidates.push(candidate);
  }

  const names = files.map((f) => f.name).sort(compareNames);
  if (new Set(candidates.map((c) => c.prefix)).size > 1) {
    throw new AmbiguousSequenceError("Frame files do not share one name prefix", directory, names);
  }
  const reason = inconsistency(candidates);
  if (reason) {
    throw new AmbiguousSequenceError(`Frame files have ${reason}`, directory, names);
  }

  const group = toSequence(candidates);
  return {
    index: 0,
    parentIndex: null,
    type: "image-sequence",
    name: group.pattern,
    relativePath: group.pattern,
    absolutePath: directory,
    size: group.members.reduce((sum, m) => sum + m.size, 0),
    pattern: group.pattern,
    members: group.members,
  };
}

/**
 * A single, lazy walk over a local tree. `units()` yields folders before
 * their contents and siblings in lexical order. It can be consumed once;
 * walking again needs a fresh `walkFolder` call.
 */
export class FolderWalk {
  readonly diagnostics: TransferError[] = [];
  private consumed = false;
  private nextIndex = 0;
  private readonly pattern: RegExp;
  private readonly minSequenceLength: number;
  private readonly includeHidden: boolean;

  constructor(readonly rootPath: string, private readonly options: WalkOptions = {}) {
    this.pattern = options.framePattern ?? DEFAULT_CONFIG.framePattern;
    this.minSequenceLength = Math.max(2, options.minSequenceLength ?? DEFAULT_CONFIG.minSequenceLength);
    this.includeHidden = options.includeHidden ?? false;
  }

  units(): AsyncGenerator<TransferUnit> {
    if (this.consumed) {
      throw new Error("FolderWalk has already been consumed; call walkFolder() again");
    }
    this.consumed = true;
    return this.generate();
  }

  private async *generate(): AsyncGenerator<TransferUnit> {
    const root = path.resolve(this.rootPath);
    let stats: Stats;
    try {
      stats = await fs.stat(root);
    } catch (err) {
      throw new LocalIOError(`Path not found: ${root}`, root, { cause: err });
    }

    const hint = this.options.typeHint;

    if (!stats.isDirectory()) {
      if (hint && hint !== "file") {
        throw new LocalIOError(`Expected a directory: ${root}`, root);
      }
      const unit: FileUnit = {
        index: this.nextIndex++,
        parentIndex: null,
        type: "file",
        name: path.basename(root),
        relativePath: path.basename(root),
        absolutePath: root,
        size: stats.size,
      };
      yield unit;
      return;
    }

    if (hint === "file") {
      throw new LocalIOError(`Expected a file but found a directory: ${root}`, root);
    }

    const entries = await this.readEntries(root);
    if (entries === null) {
      throw new LocalIOError(`Directory is not readable: ${root}`, root);
    }

    if (hint === "image-sequence") {
      const files = await this.listFiles(root, entries);
      const unit = await classifySequence(
        files.map((f) => f.path),
        { framePattern: this.pattern }
      );
      this.nextIndex = 1;
      yield unit;
      return;
    }

    const rootUnit: FolderUnit = {
      index: this.nextIndex++,
      parentIndex: null,
      type: "folder",
      name: path.basename(root),
      relativePath: "",
      absolutePath: root,
      size: 0,
    };
    yield rootUnit;
    yield* this.walkDirectory(root, "", rootUnit.index, entries);
  }

  private async readEntries(dir: string): Promise<Dirent[] | null> {
    try {
      return await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      this.diagnostics.push(new LocalIOError(`Directory is not readable: ${dir}`, dir, { cause: err }));
      return null;
    }
  }

  private visible(entries: Dirent[]): Dirent[] {
    return this.includeHidden ? entries : entries.filter((e) => !e.name.startsWith("."));
  }

  private async listFiles(dir: string, entries: Dirent[]): Promise<LocalFile[]> {
    const files: LocalFile[] = [];
    for (const entry of this.visible(entries)) {
      const full = path.join(dir, entry.name);
      try {
        const stats = await fs.stat(full);
        if (stats.isFile()) files.push({ name: entry.name, path: full, size: stats.size });
      } catch (err) {
        this.diagnostics.push(new LocalIOError(`Cannot stat ${full}`, full, { cause: err }));
      }
    }
    return files;
  }

  private async siblings(dir: string, dirRel: string, entries: Dirent[]): Promise<Sibling[]> {
    const dirs: Sibling[] = [];
    const files: LocalFile[] = [];

    for (const entry of this.visible(entries)) {
      const full = path.join(dir, entry.name);
      let stats: Stats;
      try {
        stats = await fs.stat(full);
      } catch (err) {
        this.diagnostics.push(new LocalIOError(`Cannot stat ${full}`, full, { cause: err }));
        continue;
      }
      if (stats.isDirectory() && entry.isSymbolicLink()) {
        // linked files are read through; linked directories are never entered
        this.diagnostics.push(new LocalIOError(`Skipping linked directory ${full}`, full));
      } else if (stats.isDirectory()) {
        dirs.push({ key: entry.name, kind: "dir", name: entry.name, path: full });
      } else if (stats.isFile()) {
        files.push({ name: entry.name, path: full, size: stats.size });
      }
    }

    const grouped = groupFrames(files, dirRel === "" ? "." : dirRel, this.pattern, this.minSequenceLength);
    this.diagnostics.push(...grouped.ambiguous);

    const siblings: Sibling[] = [
      ...dirs,
      ...grouped.singles.map((file): Sibling => ({ key: file.name, kind: "file", file })),
      ...grouped.sequences.map((group): Sibling => ({ key: group.members[0].name, kind: "sequence", group })),
    ];
    return siblings.sort((a, b) => compareNames(a.key, b.key));
  }

  private async *walkDirectory(
    dir: string,
    dirRel: string,
    parentIndex: number,
    entries: Dirent[]
  ): AsyncGenerator<TransferUnit> {
    for (const sibling of await this.siblings(dir, dirRel, entries)) {
      const index = this.nextIndex++;

      if (sibling.kind === "dir") {
        const relativePath = joinRelative(dirRel, sibling.name);
        const unit: FolderUnit = {
          index,
          parentIndex,
          type: "folder",
          name: sibling.name,
          relativePath,
          absolutePath: sibling.path,
          size: 0,
        };
        yield unit;
        const children = await this.readEntries(sibling.path);
        if (children) {
          yield* this.walkDirectory(sibling.path, relativePath, index, children);
        }
      } else if (sibling.kind === "file") {
        const unit: FileUnit = {
          index,
          parentIndex,
          type: "file",
          name: sibling.file.name,
          relativePath: joinRelative(dirRel, sibling.file.name),
          absolutePath: sibling.file.path,
          size: sibling.file.size,
        };
        yield unit;
      } else {
        const { group } = sibling;
        const unit: SequenceUnit = {
          index,
          parentIndex,
          type: "image-sequence",
          name: group.pattern,
          relativePath: joinRelative(dirRel, group.pattern),
          absolutePath: dir,
          size: group.members.reduce((sum, m) => sum + m.size, 0),
          pattern: group.pattern,
          members: group.members,
        };
        yield unit;
      }
    }
  }
}

export function walkFolder(rootPath: string, options?: WalkOptions): FolderWalk {
  return new FolderWalk(rootPath, options);
}

/** Drain a walk into its arena: units addressed by index, parents by parentIndex. */
export async function collectUnits(walk: FolderWalk): Promise<TransferUnit[]> {
  const units: TransferUnit[] = [];
  for await (const unit of walk.units()) {
    units.push(unit);
  }
  return units;
}
