export interface Point {
  x: number;
  y: number;
}

export interface BoundingBox extends Point {
  width: number;
  height: number;
}

export interface MatchResult {
  found: boolean;
  confidence: number;
  location: Point;
  boundingBox: BoundingBox;
  searchDurationMs: number;
}
