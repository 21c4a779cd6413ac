import { type Kysely, sql } from "kysely";

export async function up(db: Kysely<unknown>): Promise<void> {
  await sql`CREATE SCHEMA IF NOT EXISTS app`.execute(db);

  // Table: app.organizations
  await sql`
		CREATE TABLE app.organizations (
			id text PRIMARY KEY DEFAULT gen_random_uuid()::text,
			name text NOT NULL,
			description text,
			created_at timestamptz NOT NULL DEFAULT now(),
			updated_at timestamptz NOT NULL DEFAULT now()
		)
	`.execute(db);

  // Table: app.resources (ownership lives in the relationship store too)
  await sql`
		CREATE TABLE app.resources (
			id text PRIMARY KEY DEFAULT gen_random_uuid()::text,
			name text NOT NULL,
			description text,
			resource_type text NOT NULL,
			organization_id text NOT NULL,
			created_at timestamptz NOT NULL DEFAULT now(),
			updated_at timestamptz NOT NULL DEFAULT now()
		)
	`.execute(db);

  await sql`
		CREATE INDEX idx_organizations_name ON app.organizations (name)
	`.execute(db);

  await sql`
		CREATE INDEX idx_resources_organization ON app.resources (organization_id)
	`.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await sql`DROP TABLE IF EXISTS app.resources`.execute(db);
  await sql`DROP TABLE IF EXISTS app.organizations`.execute(db);
  await sql`DROP SCHEMA IF EXISTS app`.execute(db);
}
