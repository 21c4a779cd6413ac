import { InvalidObjectRefError } from "src/core/errors.ts";
import { type ObjectType, SUBJECT_TYPE } from "src/core/types.ts";

export function objectRef(type: string, id: string): string {
  return `${type}:${id}`;
}

export function userRef(subject: string): string {
  return objectRef(SUBJECT_TYPE, subject);
}

/** Split a `type:id` reference; ids may themselves contain colons */
export function parseObjectRef(ref: string): { type: string; id: string } {
  const colonIdx = ref.indexOf(":");
  if (colonIdx <= 0 || colonIdx === ref.length - 1) {
    throw new InvalidObjectRefError(ref);
  }
  return { type: ref.slice(0, colonIdx), id: ref.slice(colonIdx + 1) };
}

/**
 * Reduce `type:id` refs returned by a reverse lookup to the ids of one type.
 * Refs of other types are dropped and duplicates collapse.
 */
export function idsOfType(
  refs: Iterable<string>,
  type: ObjectType,
): Set<string> {
  const ids = new Set<string>();
  for (const ref of refs) {
    const parsed = parseObjectRef(ref);
    if (parsed.type === type) {
      ids.add(parsed.id);
    }
  }
  return ids;
}
