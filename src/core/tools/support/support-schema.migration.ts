import type { Knex } from "knex";

/** Creates the support tables when they are missing. */
export const supportSchemaMigration = async (db: Knex): Promise<void> => {
  if (!(await db.schema.hasTable("users"))) {
    await db.schema.createTable("users", (table) => {
      table.string("id", 64).primary();
      table.string("full_name", 255).notNullable();
      table.string("email", 255).notNullable();
      table.string("phone", 64).nullable();
      table.string("status", 32).notNullable();
      table.string("created_at", 40).notNullable();
    });
  }

  if (!(await db.schema.hasTable("merchants"))) {
    await db.schema.createTable("merchants", (table) => {
      table.string("id", 64).primary();
      table.string("user_id", 64).notNullable().references("id").inTable("users");
      table.string("legal_name", 255).notNullable();
      table.string("trade_name", 255).notNullable();
      table.string("document", 64).notNullable();
      table.string("segment", 64).notNullable();
      table.string("onboarding_status", 32).notNullable();
    });
  }

  if (!(await db.schema.hasTable("account_status"))) {
    await db.schema.createTable("account_status", (table) => {
      table.string("merchant_id", 64).primary().references("id").inTable("merchants");
      table.double("balance_available").notNullable();
      table.double("balance_blocked").notNullable();
      table.integer("transfers_enabled").notNullable();
      table.text("block_reason").nullable();
      table.string("last_transfer_at", 40).nullable();
    });
  }

  if (!(await db.schema.hasTable("auth_status"))) {
    await db.schema.createTable("auth_status", (table) => {
      table.string("user_id", 64).primary().references("id").inTable("users");
      table.string("last_login_at", 40).nullable();
      table.integer("failed_login_attempts").notNullable();
      table.integer("is_locked").notNullable();
      table.text("lock_reason").nullable();
    });
  }

  if (!(await db.schema.hasTable("devices"))) {
    await db.schema.createTable("devices", (table) => {
      table.string("id", 64).primary();
      table.string("merchant_id", 64).notNullable().references("id").inTable("merchants");
      table.string("type", 32).notNullable();
      table.string("model", 64).notNullable();
      table.string("status", 32).notNullable();
      table.string("activated_at", 40).notNullable();
      table.string("last_seen_at", 40).nullable();
    });
  }

  if (!(await db.schema.hasTable("transfers"))) {
    await db.schema.createTable("transfers", (table) => {
      table.string("id", 64).primary();
      table.string("merchant_id", 64).notNullable().references("id").inTable("merchants");
      table.double("amount").notNullable();
      table.string("status", 32).notNullable();
      table.text("failure_reason").nullable();
      table.string("created_at", 40).notNullable();
      table.index(["merchant_id", "created_at"], "transfers_merchant_created_idx");
    });
  }

  if (!(await db.schema.hasTable("incidents"))) {
    await db.schema.createTable("incidents", (table) => {
      table.string("id", 64).primary();
      table.string("scope", 64).notNullable();
      table.integer("active").notNullable();
      table.text("description").notNullable();
      table.string("started_at", 40).notNullable();
    });
  }
};
