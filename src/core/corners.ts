export type CornerToken = 'top_left' | 'top_right' | 'bottom_right' | 'bottom_left';

export interface ScreenGeometry {
  width: number;
  height: number;
  /** Max distance from both edges, exclusive, for a click to count. */
  cornerThreshold: number;
}

export const DEFAULT_CORNER_THRESHOLD = 50;

export const DEFAULT_SCREEN_GEOMETRY: Readonly<ScreenGeometry> = Object.freeze({
  width: 1920,
  height: 1080,
  cornerThreshold: DEFAULT_CORNER_THRESHOLD,
});

/**
 * Which corner, if any, a click landed in. Checked in clockwise order from
 * top-left so overlapping zones on tiny screens resolve the same way every
 * time.
 */
export function classifyCorner(x: number, y: number, geometry: ScreenGeometry): CornerToken | null {
  if (!Number.isFinite(x) || !Number.isFinite(y)) return null;

  const { width, height, cornerThreshold: t } = geometry;
  const left = x < t;
  const right = x > width - t;
  const top = y < t;
  const bottom = y > height - t;

  if (left && top) return 'top_left';
  if (right && top) return 'top_right';
  if (right && bottom) return 'bottom_right';
  if (left && bottom) return 'bottom_left';
  return null;
}
