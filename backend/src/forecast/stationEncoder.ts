import { z } from "zod";
import { VocabularyError } from "../utils/errors";

export interface StationEncoding {
  /** Sorted vocabulary; a station's id is its index. */
  readonly stations: readonly string[];
  readonly ids: ReadonlyMap<string, number>;
}

const compareCodepoints = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/** Ids follow codepoint order, so the same station set always yields the same ids. */
export const fitEncoder = (stations: Iterable<string>): StationEncoding => {
  const vocabulary = Array.from(new Set(stations)).sort(compareCodepoints);
  return {
    stations: vocabulary,
    ids: new Map(vocabulary.map((station, index) => [station, index])),
  };
};

export const encodeStation = (encoding: StationEncoding, station: string): number => {
  const id = encoding.ids.get(station);
  if (id === undefined) {
    throw new VocabularyError(station);
  }
  return id;
};

export const decodeStation = (encoding: StationEncoding, id: number): string => {
  const station = Number.isInteger(id) ? encoding.stations[id] : undefined;
  if (station === undefined) {
    throw new VocabularyError(id);
  }
  return station;
};

const serializedEncoderSchema = z.object({
  stations: z.array(z.string()),
});

export type SerializedEncoder = z.infer<typeof serializedEncoderSchema>;

export const serializeEncoder = (encoding: StationEncoding): SerializedEncoder => ({
  stations: [...encoding.stations],
});

/** Restores the exact id assignment that was persisted; the vocabulary is not re-sorted. */
export const deserializeEncoder = (payload: unknown): StationEncoding => {
  const { stations } = serializedEncoderSchema.parse(payload);
  return {
    stations,
    ids: new Map(stations.map((station, index) => [station, index])),
  };
};
