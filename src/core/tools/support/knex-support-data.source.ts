import type { OnModuleDestroy } from "@nestjs/common";
import knex, { type Knex } from "knex";
import type { SupportDataConfig } from "../../../config/types";
import type {
  AccountStatusRecord,
  AuthStatusRecord,
  CustomerOverview,
  CustomerRecord,
  DeviceRecord,
  IncidentRecord,
  MerchantRecord,
  RecentOperations,
  SupportDataSource,
  TransferRecord,
} from "./support-data.source";
import { supportSchemaMigration } from "./support-schema.migration";

type Flag = number;

type AccountStatusRow = Omit<AccountStatusRecord, "transfers_enabled"> & {
  transfers_enabled: Flag;
};
type AuthStatusRow = Omit<AuthStatusRecord, "is_locked"> & { is_locked: Flag };
type IncidentRow = Omit<IncidentRecord, "active"> & { active: Flag };

export function createSupportKnexConfig(config: SupportDataConfig): Knex.Config {
  return {
    client: config.client,
    connection: { filename: config.filename },
    useNullAsDefault: true,
  };
}

export interface KnexSupportDataSourceOptions {
  knex: Knex;
  ownsConnection?: boolean;
}

export class KnexSupportDataSource implements SupportDataSource, OnModuleDestroy {
  private readonly db: Knex;
  private readonly ownsConnection: boolean;

  constructor(options: KnexSupportDataSourceOptions) {
    this.db = options.knex;
    this.ownsConnection = options.ownsConnection ?? false;
  }

  static fromConfig(config: SupportDataConfig): KnexSupportDataSource {
    return new KnexSupportDataSource({
      knex: knex(createSupportKnexConfig(config)),
      ownsConnection: true,
    });
  }

  /** Creates any missing support tables. */
  async migrate(): Promise<void> {
    await supportSchemaMigration(this.db);
  }

  async getCustomerOverview(userId: string): Promise<CustomerOverview> {
    const user = await this.db<CustomerRecord>("users").where("id", userId).first();
    if (!user) {
      return { user: null, merchant: null, account_status: null, auth_status: null };
    }

    const merchant = await this.findMerchant(userId);
    const account = merchant
      ? await this.db<AccountStatusRow>("account_status")
          .where("merchant_id", merchant.id)
          .first()
      : undefined;
    const auth = await this.db<AuthStatusRow>("auth_status").where("user_id", userId).first();

    return {
      user,
      merchant: merchant ?? null,
      account_status: account
        ? { ...account, transfers_enabled: Boolean(account.transfers_enabled) }
        : null,
      auth_status: auth ? { ...auth, is_locked: Boolean(auth.is_locked) } : null,
    };
  }

  async getRecentOperations(userId: string, limit: number): Promise<RecentOperations> {
    const merchant = await this.findMerchant(userId);
    if (!merchant) {
      return { merchant_id: null, transfers: [], devices: [] };
    }

    const transfers = await this.db<TransferRecord>("transfers")
      .where("merchant_id", merchant.id)
      .orderBy("created_at", "desc")
      .limit(limit);
    const devices = await this.db<DeviceRecord>("devices")
      .where("merchant_id", merchant.id)
      .orderByRaw("COALESCE(last_seen_at, activated_at) DESC")
      .limit(limit);

    return { merchant_id: merchant.id, transfers, devices };
  }

  async getActiveIncidents(): Promise<IncidentRecord[]> {
    const rows = await this.db<IncidentRow>("incidents")
      .where("active", 1)
      .orderBy("started_at", "desc");
    return rows.map((row) => ({ ...row, active: Boolean(row.active) }));
  }

  async onModuleDestroy(): Promise<void> {
    if (this.ownsConnection) {
      await this.db.destroy();
    }
  }

  private async findMerchant(userId: string): Promise<MerchantRecord | undefined> {
    return this.db<MerchantRecord>("merchants")
      .where("user_id", userId)
      .orderBy("id", "asc")
      .first();
  }
}
