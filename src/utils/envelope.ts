import type { Vendor } from "@/types/vendor";

export function isEnvelope<T>(value: unknown): value is Vendor.Envelope<T> {
  return typeof value === "object" && value !== null && "status" in value && typeof value.status === "boolean";
}

export function describeRejection(envelope: Vendor.Envelope<unknown>): string {
  const message = envelope.message || "Unknown reason";
  return envelope.errorcode ? `${message} (${envelope.errorcode})` : message;
}
