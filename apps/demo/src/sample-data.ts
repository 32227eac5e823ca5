/**
 * Fixed sample state the demo commands list. Newest first.
 */

export type ContainerStatus = "running" | "exited" | "created";

export interface Container {
  id: string;
  image: string;
  command: string;
  status: ContainerStatus;
  name: string;
}

export interface Network {
  id: string;
  name: string;
  driver: string;
}

export const SAMPLE_CONTAINERS: readonly Container[] = [
  { id: "a1b2c3d4e5f6", image: "nginx:latest", command: "nginx -g 'daemon off;'", status: "running", name: "web" },
  { id: "b2c3d4e5f6a1", image: "postgres:16", command: "postgres", status: "running", name: "db" },
  { id: "c3d4e5f6a1b2", image: "redis:7", command: "redis-server", status: "exited", name: "cache" },
  { id: "d4e5f6a1b2c3", image: "alpine:3.20", command: "sh", status: "created", name: "scratch" },
];

export const SAMPLE_NETWORKS: readonly Network[] = [
  { id: "f1e2d3c4b5a6", name: "bridge", driver: "bridge" },
  { id: "e2d3c4b5a6f1", name: "host", driver: "host" },
  { id: "d3c4b5a6f1e2", name: "none", driver: "null" },
];

/** Left-aligned fixed-width columns; the last column is not padded. */
export function formatRow(cells: readonly string[], widths: readonly number[]): string {
  return cells.map((cell, i) => (i < cells.length - 1 ? cell.padEnd(widths[i] ?? 0) : cell)).join("");
}
