import {
  sqliteTable,
  text,
  integer,
  real,
  index,
  uniqueIndex,
} from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";
import { TICKET_STATUSES, VERDICT_VALUES } from "../shared/constants.js";

// ---------------------------------------------------------------------------
// Helper: current-timestamp default
// ---------------------------------------------------------------------------
const currentTimestamp = sql`(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`;

// ---------------------------------------------------------------------------
// candidates
// ---------------------------------------------------------------------------
export const candidates = sqliteTable(
  "candidates",
  {
    id: text("id").primaryKey(), // ULID
    link: text("link").notNull(),
    title: text("title").notNull(),
    description: text("description").default("").notNull(),
    socialHandle: text("social_handle"),
    rewardMagnitude: real("reward_magnitude"),
    riskScore: real("risk_score"),
    socialBuzzScore: real("social_buzz_score"),
    verdict: text("verdict", { enum: VERDICT_VALUES })
      .default("unknown")
      .notNull(),
    rankScore: real("rank_score").notNull(),
    source: text("source").notNull(),
    notified: integer("notified", { mode: "boolean" }).default(false).notNull(),
    discoveredAt: text("discovered_at").default(currentTimestamp).notNull(),
  },
  (table) => ({
    linkIdx: uniqueIndex("idx_candidates_link").on(table.link),
    discoveredIdx: index("idx_candidates_discovered").on(table.discoveredAt),
    rankIdx: index("idx_candidates_rank").on(table.rankScore),
  }),
);

// ---------------------------------------------------------------------------
// send_log
// ---------------------------------------------------------------------------
export const sendLog = sqliteTable(
  "send_log",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    link: text("link").notNull(),
    sentAt: text("sent_at").default(currentTimestamp).notNull(),
  },
  (table) => ({
    linkSentIdx: index("idx_send_log_link_sent").on(table.link, table.sentAt),
  }),
);

// ---------------------------------------------------------------------------
// recipients
// ---------------------------------------------------------------------------
export const recipients = sqliteTable(
  "recipients",
  {
    recipientId: text("recipient_id").primaryKey(),
    username: text("username"),
    registeredAt: text("registered_at").default(currentTimestamp).notNull(),
    banned: integer("banned", { mode: "boolean" }).default(false).notNull(),
    unreachable: integer("unreachable", { mode: "boolean" }).default(false).notNull(),
    unreachableAt: text("unreachable_at"),
  },
  (table) => ({
    activeIdx: index("idx_recipients_active").on(table.banned, table.unreachable),
  }),
);

// ---------------------------------------------------------------------------
// score_cache
// ---------------------------------------------------------------------------
export const scoreCache = sqliteTable(
  "score_cache",
  {
    link: text("link").notNull(),
    contract: text("contract").default("").notNull(), // "" = no contract
    riskScore: real("risk_score").notNull(),
    verdict: text("verdict", { enum: VERDICT_VALUES }).notNull(),
    factors: text("factors").default("[]").notNull(), // JSON RiskFactor[]
    scoredAt: text("scored_at").default(currentTimestamp).notNull(),
  },
  (table) => ({
    keyIdx: uniqueIndex("idx_score_cache_key").on(table.link, table.contract),
  }),
);

// ---------------------------------------------------------------------------
// support_tickets
// ---------------------------------------------------------------------------
export const supportTickets = sqliteTable(
  "support_tickets",
  {
    ticketId: text("ticket_id").primaryKey(), // SB-<year>-<NNN>
    year: integer("year").notNull(),
    sequence: integer("sequence").notNull(),
    recipientId: text("recipient_id").notNull(),
    username: text("username"),
    category: text("category").notNull(),
    message: text("message").notNull(),
    status: text("status", { enum: TICKET_STATUSES }).default("open").notNull(),
    createdAt: text("created_at").default(currentTimestamp).notNull(),
    updatedAt: text("updated_at").default(currentTimestamp).notNull(),
  },
  (table) => ({
    yearSeqIdx: uniqueIndex("idx_support_tickets_year_seq").on(table.year, table.sequence),
    recipientIdx: index("idx_support_tickets_recipient").on(table.recipientId),
  }),
);
