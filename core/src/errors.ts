import type { NodeId } from "./types";

export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends SimulationError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.field = field;
  }
}

export class NoPathError extends SimulationError {
  readonly source: NodeId;
  readonly target: NodeId;

  constructor(source: NodeId, target: NodeId) {
    super(`no directed path from ${String(source)} to ${String(target)}`);
    this.source = source;
    this.target = target;
  }
}
