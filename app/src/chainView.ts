import { clamp01 } from "@core";
import type { CarriedValue, NodeId } from "@core";

export type Point = { x: number; y: number };

type Rgb = [number, number, number];

// Diverging scale: cool at 0, neutral at 0.5, warm at 1.
const COOL: Rgb = [0x3b, 0x4c, 0xc0];
const NEUTRAL: Rgb = [0xdd, 0xdd, 0xdd];
const WARM: Rgb = [0xb4, 0x04, 0x26];

function mix(a: Rgb, b: Rgb, t: number): Rgb {
  const channel = (i: 0 | 1 | 2): number => Math.round(a[i] + (b[i] - a[i]) * t);
  return [channel(0), channel(1), channel(2)];
}

function toHex(rgb: Rgb): string {
  return `#${rgb.map((channel) => channel.toString(16).padStart(2, "0")).join("")}`;
}

export function ideologyColor(score: number): string {
  const s = clamp01(score);
  return s <= 0.5 ? toHex(mix(COOL, NEUTRAL, s / 0.5)) : toHex(mix(NEUTRAL, WARM, (s - 0.5) / 0.5));
}

export type ChainLayoutOptions = {
  width: number;
  perRow: number;
  margin?: number;
  top?: number;
  rowHeight?: number;
};

/** Snake layout: left to right on even rows, right to left on odd rows. */
export function layoutChain(path: NodeId[], options: ChainLayoutOptions): Record<string, Point> {
  const { width, perRow, margin = 60, top = 80, rowHeight = 120 } = options;
  const columns = Math.max(1, Math.min(path.length, perRow));
  const spacing = columns > 1 ? (width - 2 * margin) / (columns - 1) : 0;
  const positions: Record<string, Point> = {};

  path.forEach((id, index) => {
    const row = Math.floor(index / perRow);
    const column = index % perRow;
    const slot = row % 2 === 0 ? column : columns - 1 - column;
    positions[String(id)] = {
      x: columns > 1 ? margin + slot * spacing : width / 2,
      y: top + row * rowHeight
    };
  });

  return positions;
}

export function layoutHeight(pathLength: number, perRow: number, top = 80, rowHeight = 120): number {
  const rows = Math.max(1, Math.ceil(pathLength / perRow));
  return top * 2 + (rows - 1) * rowHeight;
}

export function edgeKey(source: NodeId, target: NodeId): string {
  return `${String(source)}->${String(target)}`;
}

export type EdgeLabel = { text: string; value: number };

export function edgeLabels(carried: CarriedValue[]): Record<string, EdgeLabel> {
  const labels: Record<string, EdgeLabel> = {};
  carried.forEach((edge) => {
    labels[edgeKey(edge.source, edge.target)] = {
      text: edge.messageIdeology.toFixed(2),
      value: edge.messageIdeology
    };
  });
  return labels;
}

export type LegendStop = { offset: string; color: string };

/** Evenly spaced gradient stops for the ideology colour bar. */
export function legendStops(count: number): LegendStop[] {
  const steps = Math.max(2, count);
  return Array.from({ length: steps }, (_, i) => {
    const score = i / (steps - 1);
    return { offset: `${Math.round(score * 100)}%`, color: ideologyColor(score) };
  });
}
