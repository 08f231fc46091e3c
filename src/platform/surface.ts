/**
 * Maps terminal cells to the logical pixel space shared with the screen
 * size query, and back.
 *
 * Until the terminal reports its pixel size the surface spans the
 * provisional 1920x1080, so corner cells still land inside the corner zones.
 */

export interface SurfaceSize {
  cols: number;
  rows: number;
  width: number;
  height: number;
}

export interface CellPosition {
  /** 1-based column */
  col: number;
  /** 1-based row */
  row: number;
}

export class PointerSurface {
  private size: SurfaceSize;

  constructor(size: SurfaceSize) {
    this.size = sanitize(size, { cols: 80, rows: 24, width: 1920, height: 1080 });
  }

  get cols(): number { return this.size.cols; }
  get rows(): number { return this.size.rows; }
  get width(): number { return this.size.width; }
  get height(): number { return this.size.height; }

  get cellWidth(): number {
    return this.size.width / this.size.cols;
  }

  get cellHeight(): number {
    return this.size.height / this.size.rows;
  }

  resizeCells(cols: number, rows: number): void {
    this.size = sanitize({ ...this.size, cols, rows }, this.size);
  }

  resizePixels(width: number, height: number): void {
    this.size = sanitize({ ...this.size, width, height }, this.size);
  }

  /** Centre of a 1-based cell, in logical pixels. */
  toPixel(col: number, row: number): { x: number; y: number } {
    return {
      x: (col - 0.5) * this.cellWidth,
      y: (row - 0.5) * this.cellHeight,
    };
  }

  /** 1-based cell containing a logical pixel, clamped to the grid. */
  toCell(x: number, y: number): CellPosition {
    return {
      col: clamp(Math.floor(x / this.cellWidth) + 1, 1, this.size.cols),
      row: clamp(Math.floor(y / this.cellHeight) + 1, 1, this.size.rows),
    };
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function usable(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function sanitize(next: SurfaceSize, fallback: SurfaceSize): SurfaceSize {
  return {
    cols: usable(next.cols) ? Math.floor(next.cols) : fallback.cols,
    rows: usable(next.rows) ? Math.floor(next.rows) : fallback.rows,
    width: usable(next.width) ? next.width : fallback.width,
    height: usable(next.height) ? next.height : fallback.height,
  };
}
