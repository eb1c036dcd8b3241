import type { TicketStatus } from '../shared/constants.js';

export interface Recipient {
  recipientId: string;
  username: string | null;
  registeredAt: Date;
  /** Soft delete; banned recipients are never hard-deleted. */
  banned: boolean;
  /** Delivery reported the recipient as permanently unreachable. */
  unreachable: boolean;
}

export interface SupportTicket {
  ticketId: string;
  recipientId: string;
  username: string | null;
  category: string;
  message: string;
  status: TicketStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewSupportTicket {
  recipientId: string;
  username: string | null;
  category: string;
  message: string;
}
