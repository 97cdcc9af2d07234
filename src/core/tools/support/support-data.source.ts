export interface CustomerRecord {
  id: string;
  full_name: string;
  email: string;
  phone: string | null;
  status: string;
  created_at: string;
}

export interface MerchantRecord {
  id: string;
  user_id: string;
  legal_name: string;
  trade_name: string;
  document: string;
  segment: string;
  onboarding_status: string;
}

export interface AccountStatusRecord {
  merchant_id: string;
  balance_available: number;
  balance_blocked: number;
  transfers_enabled: boolean;
  block_reason: string | null;
  last_transfer_at: string | null;
}

export interface AuthStatusRecord {
  user_id: string;
  last_login_at: string | null;
  failed_login_attempts: number;
  is_locked: boolean;
  lock_reason: string | null;
}

export interface TransferRecord {
  id: string;
  merchant_id: string;
  amount: number;
  status: string;
  failure_reason: string | null;
  created_at: string;
}

export interface DeviceRecord {
  id: string;
  merchant_id: string;
  type: string;
  model: string;
  status: string;
  activated_at: string;
  last_seen_at: string | null;
}

export interface IncidentRecord {
  id: string;
  scope: string;
  active: boolean;
  description: string;
  started_at: string;
}

export interface CustomerOverview {
  user: CustomerRecord | null;
  merchant: MerchantRecord | null;
  account_status: AccountStatusRecord | null;
  auth_status: AuthStatusRecord | null;
}

export interface RecentOperations {
  merchant_id: string | null;
  transfers: TransferRecord[];
  devices: DeviceRecord[];
}

/** Read-only view of the support database used by the support tools. */
export interface SupportDataSource {
  getCustomerOverview(userId: string): Promise<CustomerOverview>;
  getRecentOperations(userId: string, limit: number): Promise<RecentOperations>;
  getActiveIncidents(): Promise<IncidentRecord[]>;
}

export const SUPPORT_DATA_SOURCE = Symbol.for("switchboard:support-data-source");
