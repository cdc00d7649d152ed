import type { SmartApiError, ErrorCode } from "@/constants";
import type { Logger, TotpProvider } from "@/utils";
import type { Session } from "@/domains/session";
import type { Order } from "@/domains/order";
import type { Vendor } from "@/types/vendor";

export interface SmartApiConfig {
  apiKey: string;
  clientCode: string;
  password: string;
  /** Base32 TOTP seed shown when enabling TOTP for the account. */
  totpSeed: string;
  correlationId: string;
  baseUrl?: string;
  clientLocalIp?: string;
  clientPublicIp?: string;
  macAddress?: string;
  /** Overrides code generation from `totpSeed`. */
  totp?: TotpProvider;
  logger?: Logger;
  callbacks?: SmartApiCallbacks;
}

export interface SmartApiCallbacks {
  onError?: (error: SmartApiError) => void;
  onLogin?: (session: Session.Active) => void;
  onSessionInvalidated?: (reason: string) => void;
  onOrderPlaced?: (response: Vendor.Envelope<Order.PlaceResult>) => void;
  onOrderCancelled?: (response: Vendor.Envelope<Order.CancelResult>) => void;
}

export interface ClientContext {
  config: SmartApiConfig;
  callbacks: SmartApiCallbacks;
  baseUrl: string;
  totp: TotpProvider;
  logger: Logger;
  session: Session.Active | null;
  pendingLogin: Promise<Session.Active> | null;
  ensureSession(): Promise<Session.Active>;
  invalidateSession(rejected: Session.Active, reason: string): void;
  throwError(code: ErrorCode, message: string): never;
}
