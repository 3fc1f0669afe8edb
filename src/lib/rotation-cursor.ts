export type RotationCursor = {
  readonly roster: readonly string[];
  index: number; // never wrapped; modulo is applied on read
};

export function createRotationCursor(roster: readonly string[]): RotationCursor {
  return { roster, index: 0 };
}

export function memberAt(roster: readonly string[], index: number): string {
  return roster[index % roster.length];
}

export function peekCandidate(cursor: RotationCursor): string {
  return memberAt(cursor.roster, cursor.index);
}

export function advanceCursor(cursor: RotationCursor): void {
  cursor.index += 1;
}
