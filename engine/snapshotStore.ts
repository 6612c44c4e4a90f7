// engine/snapshotStore.ts
// In-memory memo of the last normalized snapshot, keyed by input identity.
// Saving under a new key replaces the entry wholesale; nothing is patched in place.

import { createHash } from 'crypto';
import type { NormalizedSnapshot } from './types';

interface SnapshotEntry {
  key: string;
  snapshot: NormalizedSnapshot;
}

let current: SnapshotEntry | null = null;

export function snapshotKeyForBytes(data: ArrayBuffer): string {
  return createHash('sha256').update(new Uint8Array(data)).digest('hex');
}

export function snapshotKeyForText(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

export function saveSnapshot(key: string, snapshot: NormalizedSnapshot): void {
  current = { key, snapshot };
}

export function getSnapshot(key: string): NormalizedSnapshot | undefined {
  return current && current.key === key ? current.snapshot : undefined;
}

export function clearSnapshot(): void {
  current = null;
}
