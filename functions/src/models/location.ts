export interface Coordinate {
  readonly lat: number;
  readonly lng: number;
}

export interface Location {
  name: string | null;
  address: string | null;
  coordinate: Coordinate | null;
}

/** Rendered as `yyyy-MM-dd hh:mm:ss a` in the campus time zone. */
export type TimestampString = string;
