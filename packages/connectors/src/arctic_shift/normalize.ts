import { type ArchiveRecord, type ArchiveResponse, asRecord } from "@archive-sweep/shared";

import { readDataArray, toRecords } from "../page";

type TreeNode = { kind: string; data: Record<string, unknown> };

function asTreeNode(value: unknown): TreeNode | null {
  const node = asRecord(value);
  if (typeof node.kind !== "string") return null;
  const data = asRecord(node.data);
  return Object.keys(data).length > 0 ? { kind: node.kind, data } : null;
}

/**
 * comments/tree nests replies Reddit-listing style:
 * `{ kind: "t1", data: { ..., replies: { data: { children: [...] } } } }`.
 * Flatten depth-first (parent before its replies) and drop `more` stubs.
 */
function flattenTree(entries: unknown[], out: unknown[]): void {
  for (const entry of entries) {
    const node = asTreeNode(entry);
    if (!node) {
      out.push(entry);
      continue;
    }
    if (node.kind === "more") continue;

    const { replies, ...comment } = node.data;
    out.push(comment);
    const children = asRecord(asRecord(replies).data).children;
    if (Array.isArray(children)) flattenTree(children, out);
  }
}

export function normalizeArcticShift(response: ArchiveResponse): ArchiveRecord[] {
  const entries = readDataArray(response.body, "arctic_shift");
  const flat: unknown[] = [];
  flattenTree(entries, flat);
  return toRecords(flat, "arctic_shift");
}
