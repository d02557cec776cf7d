import type { Universe } from "./universe";

export interface CanvasStyle {
  cellSize: number;
  gridColor: string;
  deadColor: string;
  aliveColor: string;
}

export const DEFAULT_CANVAS_STYLE: CanvasStyle = {
  cellSize: 10,
  gridColor: "#CCCCCC",
  deadColor: "#FFFFFF",
  aliveColor: "#000000",
};

// The slice of CanvasRenderingContext2D the painter touches
export type LifeSurface = Pick<
  CanvasRenderingContext2D,
  "beginPath" | "moveTo" | "lineTo" | "stroke" | "fillRect"
> & {
  strokeStyle: CanvasRenderingContext2D["strokeStyle"];
  fillStyle: CanvasRenderingContext2D["fillStyle"];
};

export function canvasSize(
  universe: Universe,
  style: CanvasStyle = DEFAULT_CANVAS_STYLE,
) {
  const pitch = style.cellSize + 1;
  return {
    width: pitch * universe.width + 1,
    height: pitch * universe.height + 1,
  };
}

export function drawGrid(
  ctx: LifeSurface,
  universe: Universe,
  style: CanvasStyle = DEFAULT_CANVAS_STYLE,
) {
  const pitch = style.cellSize + 1;
  const { width, height } = canvasSize(universe, style);

  ctx.beginPath();
  ctx.strokeStyle = style.gridColor;

  // Vertical lines
  for (let i = 0; i <= universe.width; i++) {
    ctx.moveTo(i * pitch + 1, 0);
    ctx.lineTo(i * pitch + 1, height);
  }

  // Horizontal lines
  for (let j = 0; j <= universe.height; j++) {
    ctx.moveTo(0, j * pitch + 1);
    ctx.lineTo(width, j * pitch + 1);
  }

  ctx.stroke();
}

export function drawCells(
  ctx: LifeSurface,
  universe: Universe,
  style: CanvasStyle = DEFAULT_CANVAS_STYLE,
) {
  const { cellSize } = style;
  const cells = universe.cells();

  ctx.beginPath();
  for (let row = 0; row < universe.height; row++) {
    for (let col = 0; col < universe.width; col++) {
      ctx.fillStyle = cells[row * universe.width + col]
        ? style.aliveColor
        : style.deadColor;
      ctx.fillRect(
        col * (cellSize + 1) + 1,
        row * (cellSize + 1) + 1,
        cellSize,
        cellSize,
      );
    }
  }
  ctx.stroke();
}

export function canvasPainter(
  ctx: LifeSurface,
  style: CanvasStyle = DEFAULT_CANVAS_STYLE,
) {
  return (universe: Universe) => {
    drawGrid(ctx, universe, style);
    drawCells(ctx, universe, style);
  };
}
