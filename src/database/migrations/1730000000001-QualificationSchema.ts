import { MigrationInterface, QueryRunner } from 'typeorm';

export class QualificationSchema1730000000001 implements MigrationInterface {
  name = 'QualificationSchema1730000000001';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE "historical_standings" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "season" integer NOT NULL,
        "confederation" varchar(16) NOT NULL,
        "stage" varchar(150) NOT NULL,
        "group_name" varchar(100) NOT NULL,
        "team" varchar(100) NOT NULL,
        "rank" integer,
        "points" integer NOT NULL,
        "played" integer NOT NULL,
        "wins" integer NOT NULL DEFAULT 0,
        "draws" integer NOT NULL DEFAULT 0,
        "losses" integer NOT NULL DEFAULT 0,
        "goals_for" integer NOT NULL DEFAULT 0,
        "goals_against" integer NOT NULL DEFAULT 0,
        "goal_diff" integer NOT NULL,
        "qualified" boolean NOT NULL,
        "note" text,
        "source_url" text,
        "rank_bucket" varchar(8) NOT NULL,
        "points_per_game" numeric(4,2),
        "ppg_bucket" varchar(12),
        "goal_diff_bucket" varchar(8) NOT NULL,
        "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_historical_standings" PRIMARY KEY ("id"),
        CONSTRAINT "uq_historical_standings_key" UNIQUE ("season", "confederation", "stage", "group_name", "team")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "historical_probability_lookup" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "confederation" varchar(16) NOT NULL,
        "stage" varchar(150) NOT NULL,
        "rank" integer,
        "rank_bucket" varchar(8),
        "ppg_bucket" varchar(12),
        "lookup_level" varchar(10) NOT NULL,
        "historical_qual_prob" numeric(5,4) NOT NULL,
        "sample_size" integer NOT NULL,
        "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_historical_probability_lookup" PRIMARY KEY ("id"),
        CONSTRAINT "chk_historical_qual_prob" CHECK ("historical_qual_prob" BETWEEN 0 AND 1)
      )
    `);

    // rank and the buckets are nullable, so uniqueness needs an expression index
    await queryRunner.query(`
      CREATE UNIQUE INDEX "uq_historical_probability_lookup_key" ON "historical_probability_lookup" (
        "confederation",
        "stage",
        "lookup_level",
        COALESCE("rank", -1),
        COALESCE("rank_bucket", ''),
        COALESCE("ppg_bucket", '')
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "prediction_runs" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "run_type" varchar(20) NOT NULL,
        "status" varchar(10) NOT NULL,
        "input_hash" char(64) NOT NULL,
        "historical_lookup_hash" char(64),
        "model_version" varchar(50) NOT NULL,
        "input_params" jsonb,
        "started_at" TIMESTAMP WITH TIME ZONE NOT NULL,
        "completed_at" TIMESTAMP WITH TIME ZONE,
        "execution_time_seconds" numeric(10,3),
        "rows_processed" integer NOT NULL DEFAULT 0,
        "rows_inserted" integer NOT NULL DEFAULT 0,
        "rows_updated" integer NOT NULL DEFAULT 0,
        "rows_failed" integer NOT NULL DEFAULT 0,
        "qualified_count" integer NOT NULL DEFAULT 0,
        "in_progress_count" integer NOT NULL DEFAULT 0,
        "avg_probability" numeric(5,2),
        "min_probability" numeric(5,2),
        "max_probability" numeric(5,2),
        "probability_distribution" jsonb,
        "rank_level_matches" integer NOT NULL DEFAULT 0,
        "bucket_level_matches" integer NOT NULL DEFAULT 0,
        "no_historical_match" integer NOT NULL DEFAULT 0,
        "confederation_counts" jsonb,
        "error_message" text,
        "error_details" jsonb,
        "warnings" jsonb,
        "execution_context" varchar(10) NOT NULL,
        "environment" varchar(20) NOT NULL,
        "notes" text,
        CONSTRAINT "PK_prediction_runs" PRIMARY KEY ("id"),
        CONSTRAINT "chk_prediction_runs_status" CHECK ("status" IN ('running', 'success', 'partial', 'failed'))
      )
    `);

    await queryRunner.query(`
      CREATE INDEX "idx_prediction_runs_dedup"
      ON "prediction_runs"("input_hash", "historical_lookup_hash", "model_version", "status")
    `);

    await queryRunner.query(`
      CREATE INDEX "idx_prediction_runs_started_at" ON "prediction_runs"("started_at")
    `);

    await queryRunner.query(`
      CREATE TABLE "team_slot_probabilities" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "team" varchar(100) NOT NULL,
        "confederation" varchar(16) NOT NULL,
        "current_group" varchar(100) NOT NULL,
        "stage" varchar(150) NOT NULL,
        "position" integer,
        "points" integer NOT NULL,
        "played" integer NOT NULL,
        "goal_diff" integer NOT NULL,
        "prob_fill_slot" numeric(5,2) NOT NULL,
        "qualification_status" varchar(20) NOT NULL,
        "lookup_level" varchar(10) NOT NULL,
        "run_id" uuid,
        "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL,
        CONSTRAINT "PK_team_slot_probabilities" PRIMARY KEY ("id"),
        CONSTRAINT "uq_team_slot_probabilities_key" UNIQUE ("team", "confederation", "current_group"),
        CONSTRAINT "chk_prob_fill_slot" CHECK ("prob_fill_slot" BETWEEN 0 AND 100)
      )
    `);

    await queryRunner.query(`
      ALTER TABLE "team_slot_probabilities"
      ADD CONSTRAINT "FK_team_slot_probabilities_run"
      FOREIGN KEY ("run_id") REFERENCES "prediction_runs"("id") ON DELETE SET NULL
    `);

    await queryRunner.query(`
      CREATE INDEX "idx_team_slot_probabilities_confederation"
      ON "team_slot_probabilities"("confederation", "prob_fill_slot" DESC)
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX "idx_team_slot_probabilities_confederation"`);
    await queryRunner.query(
      `ALTER TABLE "team_slot_probabilities" DROP CONSTRAINT "FK_team_slot_probabilities_run"`,
    );
    await queryRunner.query(`DROP TABLE "team_slot_probabilities"`);
    await queryRunner.query(`DROP INDEX "idx_prediction_runs_started_at"`);
    await queryRunner.query(`DROP INDEX "idx_prediction_runs_dedup"`);
    await queryRunner.query(`DROP TABLE "prediction_runs"`);
    await queryRunner.query(`DROP INDEX "uq_historical_probability_lookup_key"`);
    await queryRunner.query(`DROP TABLE "historical_probability_lookup"`);
    await queryRunner.query(`DROP TABLE "historical_standings"`);
  }
}
