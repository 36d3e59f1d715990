import fs from "fs-extra";
import path from "node:path";
import type { PreviewDirective, TransferUnit } from "@/types";
import { InvalidPreviewSource } from "./errors";

/**
 * Decide how an appendage gets its preview. An explicit file always wins,
 * even when `createPreview` is false.
 */
export function decidePreview(createPreview: boolean, previewPath?: string): PreviewDirective {
  if (previewPath !== undefined && previewPath !== "") {
    return { kind: "client-supplied", path: path.resolve(previewPath) };
  }
  if (createPreview) {
    return { kind: "server-generated" };
  }
  return { kind: "none" };
}

/** Like decidePreview, but an explicit path must be a readable regular file. */
export async function resolvePreview(createPreview: boolean, previewPath?: string): Promise<PreviewDirective> {
  const directive = decidePreview(createPreview, previewPath);
  if (directive.kind !== "client-supplied") {
    return directive;
  }

  try {
    await fs.access(directive.path, fs.constants.R_OK);
    const stats = await fs.stat(directive.path);
    if (!stats.isFile()) {
      throw new InvalidPreviewSource(directive.path);
    }
  } catch (err) {
    if (err instanceof InvalidPreviewSource) throw err;
    throw new InvalidPreviewSource(directive.path, { cause: err });
  }
  return directive;
}

/**
 * Preview directive per unit index. The root gets the resolved directive;
 * files and sequences below it follow `createPreview`; nested folders get none.
 */
export function planPreviews(
  units: TransferUnit[],
  createPreview: boolean,
  rootDirective: PreviewDirective
): Map<number, PreviewDirective> {
  const plan = new Map<number, PreviewDirective>();
  for (const unit of units) {
    if (unit.parentIndex === null) {
      plan.set(unit.index, rootDirective);
    } else if (unit.type === "folder") {
      plan.set(unit.index, { kind: "none" });
    } else {
      plan.set(unit.index, decidePreview(createPreview));
    }
  }
  return plan;
}
