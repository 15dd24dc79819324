import type { DocumentSnapshot, DocumentSnapshotEntity } from "./document.js";

export interface EntityChange {
  id: string;
  fields: Array<"name" | "solid" | "closedProfiles" | "parentId">;
}

export interface DocumentDiff {
  added: DocumentSnapshotEntity[];
  removed: DocumentSnapshotEntity[];
  changed: EntityChange[];
  summary: {
    added: number;
    removed: number;
    changed: number;
    solidsBefore: number;
    solidsAfter: number;
  };
}

const COMPARED_FIELDS: EntityChange["fields"] = ["name", "solid", "closedProfiles", "parentId"];

/** What a preview would do to the live document, entity by entity, in timeline order. */
export function diffSnapshots(before: DocumentSnapshot, after: DocumentSnapshot): DocumentDiff {
  const beforeById = new Map(before.entities.map((entity) => [entity.id, entity]));
  const afterIds = new Set(after.entities.map((entity) => entity.id));

  const added: DocumentSnapshotEntity[] = [];
  const changed: EntityChange[] = [];
  for (const entity of after.entities) {
    const previous = beforeById.get(entity.id);
    if (!previous) {
      added.push(entity);
      continue;
    }
    const fields = COMPARED_FIELDS.filter((field) => previous[field] !== entity[field]);
    if (fields.length > 0) changed.push({ id: entity.id, fields });
  }
  const removed = before.entities.filter((entity) => !afterIds.has(entity.id));

  return {
    added,
    removed,
    changed,
    summary: {
      added: added.length,
      removed: removed.length,
      changed: changed.length,
      solidsBefore: before.solidCount,
      solidsAfter: after.solidCount,
    },
  };
}
