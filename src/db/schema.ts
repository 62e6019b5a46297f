import {
  pgTable,
  serial,
  integer,
  text,
  varchar,
  boolean,
  timestamp,
  index,
} from "drizzle-orm/pg-core";

// Keep in step with sql/schema.sql.

// ── Sources ──────────────────────────────────────────────────────

export const sources = pgTable("sources", {
  id: serial("id").primaryKey(),
  name: text("name").notNull().unique(),
  type: varchar("type", { length: 32 }).notNull(),
  url: text("url").notNull(),
  enabled: boolean("enabled").default(true).notNull(),
  lastFetchAt: timestamp("last_fetch_at", { withTimezone: true }),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

// ── Digests ──────────────────────────────────────────────────────

export const digests = pgTable("digests", {
  id: serial("id").primaryKey(),
  weekStartDate: timestamp("week_start_date", { withTimezone: true }).notNull(),
  weekEndDate: timestamp("week_end_date", { withTimezone: true }).notNull(),
  itemCount: integer("item_count").notNull(),
  sTierCount: integer("s_tier_count").notNull(),
  aTierCount: integer("a_tier_count").notNull(),
  obsidianPath: text("obsidian_path").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

// ── Content items ────────────────────────────────────────────────

export const contentItems = pgTable(
  "content_items",
  {
    id: serial("id").primaryKey(),
    sourceId: integer("source_id")
      .notNull()
      .references(() => sources.id),
    title: text("title").notNull(),
    url: text("url").notNull().unique(),
    description: text("description"),
    transcript: text("transcript"),
    publishedDate: timestamp("published_date", { withTimezone: true }),
    durationMinutes: integer("duration_minutes"),
    rating: varchar("rating", { length: 1 }),
    ratingReasoning: text("rating_reasoning"),
    ratedAt: timestamp("rated_at", { withTimezone: true }),
    publishedToObsidian: boolean("published_to_obsidian").default(false).notNull(),
    digestId: integer("digest_id").references(() => digests.id),
    fetchedAt: timestamp("fetched_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (t) => [
    index("idx_content_rating").on(t.rating),
    index("idx_content_published").on(t.publishedToObsidian),
    index("idx_content_date").on(t.publishedDate),
    index("idx_content_source").on(t.sourceId),
    index("idx_content_fetched").on(t.fetchedAt),
  ],
);

// ── Fetch logs (audit trail) ─────────────────────────────────────

export const fetchLogs = pgTable(
  "fetch_logs",
  {
    id: serial("id").primaryKey(),
    sourceId: integer("source_id")
      .notNull()
      .references(() => sources.id),
    itemsFetched: integer("items_fetched").notNull(),
    success: boolean("success").notNull(),
    errorMessage: text("error_message"),
    startedAt: timestamp("started_at", { withTimezone: true }).notNull(),
    completedAt: timestamp("completed_at", { withTimezone: true }).notNull(),
  },
  (t) => [index("idx_fetch_logs_source").on(t.sourceId)],
);
