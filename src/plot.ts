export interface Point {
  x: number;
  y: number;
}

export interface Series {
  label: string;
  points: Point[];
}

export interface Panel {
  title: string;
  xLabel: string;
  yLabel: string;
  /** Upper bound of the y axis; the lower bound is always 0. */
  yMax: number;
  yTickCount: number;
  series: Series[];
}

export interface Figure {
  title: string;
  subtitle: string;
  footer: string;
  width: number;
  height: number;
  panels: Panel[];
}

/** Minimal drawing backend: turns a figure into a file. */
export interface Plotter {
  save(figure: Figure, filePath: string): void;
}
