import type { BackendName } from "@archive-sweep/shared";

import { arcticShiftBackend } from "./arctic_shift";
import { pullPushBackend } from "./pullpush";
import type { ArchiveBackend } from "./types";

export const BACKENDS: ArchiveBackend[] = [pullPushBackend, arcticShiftBackend];

export function getBackend(name: BackendName | string): ArchiveBackend | undefined {
  return BACKENDS.find((b) => b.name === name);
}
