import type { photos } from "../db/schema.js";

export type PhotoRow = typeof photos.$inferSelect;
export type PhotoStatus = PhotoRow["status"];

export type PhotoState =
  | { kind: "active"; expiresAt: number }
  | { kind: "archived"; archivedAt: number | null }
  | { kind: "deleted"; deletedAt: number | null; reason: string | null };

const allowedTransitions: Record<PhotoStatus, readonly PhotoStatus[]> = {
  active: ["archived", "deleted"],
  archived: ["deleted"],
  deleted: []
};

export function photoStateOf(row: PhotoRow): PhotoState {
  switch (row.status) {
    case "active":
      return { kind: "active", expiresAt: row.expiresAt };
    case "archived":
      return { kind: "archived", archivedAt: row.archivedAt };
    case "deleted":
      return { kind: "deleted", deletedAt: row.deletedAt, reason: row.deletedReason };
  }
}

// Возврат из архива возможен только вручную, через модерацию
export function canTransition(from: PhotoStatus, to: PhotoStatus): boolean {
  return allowedTransitions[from].includes(to);
}
