// =============================================================================
// DDL — CREATE TABLE statements for one bank instance and the registry
// =============================================================================
// For deployments without drizzle-kit. Every statement is idempotent.

import { createTableResolver } from "@clearline/core/db";

export function buildCreateStatements(schema = "public"): string[] {
	const t = createTableResolver(schema);
	const statements: string[] = [];

	if (schema !== "public") {
		statements.push(`CREATE SCHEMA IF NOT EXISTS "${schema}"`);
	}

	statements.push(
		`CREATE TABLE IF NOT EXISTS ${t("account")} (
	"id" uuid PRIMARY KEY,
	"owner_id" varchar(255) NOT NULL,
	"owner_name" varchar(255) NOT NULL,
	"account_number" varchar(16) NOT NULL UNIQUE,
	"status" varchar(20) NOT NULL DEFAULT 'active',
	"balance" bigint NOT NULL DEFAULT 0 CHECK ("balance" >= 0),
	"reserved" bigint NOT NULL DEFAULT 0 CHECK ("reserved" >= 0),
	"pending_credit" bigint NOT NULL DEFAULT 0 CHECK ("pending_credit" >= 0),
	"version" integer NOT NULL DEFAULT 0,
	"created_at" text NOT NULL,
	"updated_at" text NOT NULL
)`,
		`CREATE INDEX IF NOT EXISTS "idx_account_owner" ON ${t("account")} ("owner_id")`,
		`CREATE TABLE IF NOT EXISTS ${t("account_entry")} (
	"id" uuid PRIMARY KEY,
	"account_id" uuid NOT NULL REFERENCES ${t("account")} ("id"),
	"transfer_id" uuid,
	"amount" bigint NOT NULL,
	"description" text NOT NULL,
	"balance_after" bigint NOT NULL,
	"created_at" text NOT NULL
)`,
		`CREATE INDEX IF NOT EXISTS "idx_account_entry_account" ON ${t("account_entry")} ("account_id", "created_at")`,
		`CREATE TABLE IF NOT EXISTS ${t("transfer")} (
	"id" uuid PRIMARY KEY,
	"origin_instance_id" varchar(64) NOT NULL,
	"destination_instance_id" varchar(64) NOT NULL,
	"source_account_id" uuid NOT NULL,
	"destination_account_id" varchar(255) NOT NULL,
	"amount" bigint NOT NULL CHECK ("amount" > 0),
	"status" varchar(20) NOT NULL,
	"failure_reason" varchar(40),
	"remote_reason" text,
	"cancel_requested" boolean NOT NULL DEFAULT false,
	"version" integer NOT NULL DEFAULT 0,
	"created_at" text NOT NULL,
	"updated_at" text NOT NULL
)`,
		`CREATE INDEX IF NOT EXISTS "idx_transfer_status" ON ${t("transfer")} ("status", "updated_at")`,
		`CREATE INDEX IF NOT EXISTS "idx_transfer_source" ON ${t("transfer")} ("source_account_id")`,
		`CREATE TABLE IF NOT EXISTS ${t("reservation")} (
	"id" uuid PRIMARY KEY,
	"transfer_id" uuid NOT NULL,
	"account_id" uuid NOT NULL REFERENCES ${t("account")} ("id"),
	"direction" varchar(10) NOT NULL,
	"amount" bigint NOT NULL CHECK ("amount" > 0),
	"status" varchar(20) NOT NULL,
	"expires_at" text,
	"created_at" text NOT NULL,
	"updated_at" text NOT NULL,
	UNIQUE ("transfer_id", "direction")
)`,
		`CREATE INDEX IF NOT EXISTS "idx_reservation_expiry" ON ${t("reservation")} ("status", "expires_at")`,
		`CREATE TABLE IF NOT EXISTS ${t("participant_decision")} (
	"id" uuid PRIMARY KEY,
	"origin_instance_id" varchar(64) NOT NULL,
	"source_account_id" varchar(255) NOT NULL,
	"destination_account_id" varchar(255) NOT NULL,
	"amount" bigint NOT NULL,
	"state" varchar(20) NOT NULL,
	"reason" text,
	"created_at" text NOT NULL,
	"updated_at" text NOT NULL
)`,
		`CREATE TABLE IF NOT EXISTS ${t("processed_message")} (
	"id" varchar(400) PRIMARY KEY,
	"sender_id" varchar(64) NOT NULL,
	"nonce" varchar(128) NOT NULL,
	"transfer_id" uuid NOT NULL,
	"digest" varchar(64) NOT NULL,
	"reply" jsonb NOT NULL,
	"expires_at" text NOT NULL,
	"created_at" text NOT NULL
)`,
		`CREATE INDEX IF NOT EXISTS "idx_processed_message_expiry" ON ${t("processed_message")} ("expires_at")`,
		`CREATE TABLE IF NOT EXISTS ${t("registry_instance")} (
	"id" varchar(64) PRIMARY KEY,
	"name" varchar(255) NOT NULL,
	"address" text NOT NULL,
	"public_key" text NOT NULL,
	"metadata" jsonb NOT NULL DEFAULT '{}'::jsonb,
	"registered_at" text NOT NULL,
	"updated_at" text NOT NULL
)`,
	);

	return statements;
}
