import type { ClientToServer } from "./messages.js";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isNumber(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

function isString(v: unknown): v is string {
  return typeof v === "string";
}

export function isClientToServer(v: unknown): v is ClientToServer {
  if (!isRecord(v) || !isString(v.t)) return false;

  switch (v.t) {
    case "sim/configure":
      return isNumber(v.massLarge) && isNumber(v.velocityLarge);
    case "sim/stop":
      return true;
    case "ping":
      return isNumber(v.clientTimeMs);
    default:
      return false;
  }
}
