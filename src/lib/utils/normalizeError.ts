import { AssemblyError, ConversionError, ReconciliationError, type ConversionStep } from "@/shared/errors";

export type NormalizedError = {
  message: string;
  name?: string;
  step?: ConversionStep;
  layers?: string[];
};

export function normalizeError(err: unknown): NormalizedError {
  if (err instanceof AssemblyError) {
    return { message: err.message, name: err.name, step: err.step, layers: [err.layer] };
  }
  if (err instanceof ReconciliationError) {
    return { message: err.message, name: err.name, step: err.step, layers: err.layers };
  }
  if (err instanceof ConversionError) {
    return { message: err.message, name: err.name, step: err.step };
  }
  if (err instanceof Error) {
    return { message: err.message, name: err.name };
  }
  if (typeof err === "object" && err !== null && "message" in err) {
    return { message: String(err.message) };
  }
  if (typeof err === "object" && err !== null) {
    return { message: "Unknown error" };
  }
  return { message: String(err) };
}
