import type { SessionFileData } from "./types";

/**
 * Raw storage for the session file.
 *
 * `update` is a read-modify-write of the whole document. Returning `undefined`
 * from the mutator means "nothing changed" and skips the write.
 */
export interface SessionBackend {
  read(): Promise<SessionFileData>;
  update(mutate: (current: SessionFileData) => SessionFileData | undefined): Promise<SessionFileData>;
}

export function createMemorySessionBackend(initial: SessionFileData = {}): SessionBackend & { writes: number } {
  let data: SessionFileData = clone(initial);
  const backend = {
    writes: 0,
    read: async (): Promise<SessionFileData> => clone(data),
    update: async (mutate: (current: SessionFileData) => SessionFileData | undefined): Promise<SessionFileData> => {
      const next = mutate(clone(data));
      if (next === undefined) return clone(data);
      data = clone(next);
      backend.writes += 1;
      return clone(data);
    },
  };
  return backend;
}

function clone(data: SessionFileData): SessionFileData {
  const copy: SessionFileData = JSON.parse(JSON.stringify(data));
  return copy;
}
