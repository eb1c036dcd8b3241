import type { TicketStatus } from '../shared/constants.js';
import type {
  Candidate,
  NewCandidate,
  CachedScore,
  Recipient,
  SupportTicket,
  NewSupportTicket,
} from '../types/index.js';

/**
 * Narrow persistence contract consumed by the pipeline and the command
 * layer. Implementations hold no business logic; every method either
 * resolves or rejects with a `PersistenceError`.
 */
export interface AirdropStore {
  // Candidates --------------------------------------------------------------
  candidateExists(link: string): Promise<boolean>;
  /** Must be called at most once per link. A repeat insert rejects. */
  insertCandidate(candidate: NewCandidate): Promise<Candidate>;
  getCandidate(link: string): Promise<Candidate | null>;
  markCandidateNotified(link: string): Promise<void>;
  /** Top candidates discovered since `since`, ordered by rank descending. */
  listRecentCandidates(since: Date, limit: number): Promise<Candidate[]>;

  // Send log ----------------------------------------------------------------
  wasNotifiedRecently(link: string, windowMs: number): Promise<boolean>;
  logNotified(link: string): Promise<void>;

  // Score cache -------------------------------------------------------------
  getCachedScore(link: string, contract: string | null): Promise<CachedScore | null>;
  cacheScore(link: string, contract: string | null, score: Omit<CachedScore, 'scoredAt'>): Promise<void>;

  // Recipients --------------------------------------------------------------
  /** Active recipient ids: not banned, not unreachable. Restartable per call. */
  listActiveRecipients(): Promise<string[]>;
  getRecipientCount(): Promise<number>;
  markRecipientUnreachable(recipientId: string): Promise<void>;
  /** Idempotent. Re-registering clears the unreachable flag. */
  registerRecipient(recipientId: string, username: string | null): Promise<Recipient>;
  getRecipient(recipientId: string): Promise<Recipient | null>;
  banRecipient(recipientId: string): Promise<boolean>;
  unbanRecipient(recipientId: string): Promise<boolean>;
  listBannedRecipients(): Promise<string[]>;

  // Support tickets ---------------------------------------------------------
  openSupportTicket(ticket: NewSupportTicket): Promise<SupportTicket>;
  getSupportTicket(ticketId: string): Promise<SupportTicket | null>;
  setTicketStatus(ticketId: string, status: TicketStatus): Promise<boolean>;

  /** Cheap liveness query for the health endpoint. */
  ping(): Promise<boolean>;
}
