export const HOST = {
  ANGEL_ONE: "https://apiconnect.angelone.in",
} as const;

export function resolveBaseUrl(customUrl?: string): string {
  if (customUrl) {
    return customUrl.replace(/\/+$/, "");
  }
  return HOST.ANGEL_ONE;
}
