export class VizPilotError extends Error {
  constructor(message: string, readonly code: string) {
    super(message);
    this.name = "VizPilotError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
