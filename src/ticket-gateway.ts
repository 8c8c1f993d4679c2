/**
 * TicketGateway - the mission's only view of the ticket service.
 *
 * In live mode requests go to the HTTP service. The first transport failure
 * switches the gateway to simulation mode for the rest of the run, after
 * which every request is served from the in-memory fallback list.
 */

import { TicketClient } from "./ticket-client";
import type { Position, Ticket, TicketPayload, TicketStatus } from "./types";

/**
 * What the mission agent needs from a ticket source.
 */
export interface TicketService {
  listOpenTickets(): Promise<Ticket[]>;
  updateTicketStatus(id: number, status: TicketStatus, payload?: TicketPayload): Promise<boolean>;
  coordinatesOf(ticket: Ticket): Position;
}

export function createDefaultTickets(): Ticket[] {
  return [
    {
      id: 1,
      title: "North Point Sampling - Degraded Mangrove",
      description: "Collect water samples along the northern stretch.",
      status: "open",
      coordinates: { x: 7, y: 2 },
      payload: null,
    },
    {
      id: 2,
      title: "Heavy Metals Check - Industrial Zone",
      description: "Measure heavy metal concentration near the outfall.",
      status: "open",
      coordinates: { x: 3, y: 8 },
      payload: null,
    },
    {
      id: 3,
      title: "Biodiversity Monitoring - Crab Nursery",
      description: "Assess the crab nursery habitat.",
      status: "open",
      coordinates: { x: 8, y: 6 },
      payload: null,
    },
  ];
}

function copyTicket(ticket: Ticket): Ticket {
  return {
    ...ticket,
    coordinates: { ...ticket.coordinates },
    payload: ticket.payload ? { ...ticket.payload } : null,
  };
}

export interface TicketGatewayOptions {
  baseUrl?: string;
  username?: string;
  password?: string;
  timeout?: number;
  simulation?: boolean;
  fallbackTickets?: Ticket[];
  client?: TicketClient;
}

export class TicketGateway implements TicketService {
  private client: TicketClient;
  private fallback: Ticket[];
  private _simulation: boolean;

  constructor(options: TicketGatewayOptions = {}) {
    this.client =
      options.client ??
      new TicketClient({
        baseUrl: options.baseUrl ?? "http://localhost:5000",
        username: options.username ?? "admin",
        password: options.password ?? "admin",
        timeout: options.timeout,
      });
    this.fallback = (options.fallbackTickets ?? createDefaultTickets()).map(copyTicket);
    this._simulation = options.simulation ?? false;
  }

  get simulation(): boolean {
    return this._simulation;
  }

  async listTickets(): Promise<Ticket[]> {
    if (this._simulation) {
      return this.fallback.map(copyTicket);
    }

    try {
      return await this.client.listTickets();
    } catch (error) {
      this.degrade(`Ticket API unavailable (${describe(error)}), using fallback tickets`);
      return this.fallback.map(copyTicket);
    }
  }

  async listOpenTickets(): Promise<Ticket[]> {
    const tickets = await this.listTickets();
    return tickets.filter((t) => t.status === "open");
  }

  /**
   * Returns false when the ticket is unknown or the remote update failed.
   * A failed remote update is still applied to the fallback list.
   */
  async updateTicketStatus(id: number, status: TicketStatus, payload?: TicketPayload): Promise<boolean> {
    if (this._simulation) {
      const applied = this.applyLocally(id, status, payload);
      if (applied) {
        console.log(`[Tickets] [SIM] Ticket #${id} -> ${status}`);
      }
      return applied;
    }

    try {
      await this.client.updateTicket(id, status, payload);
      console.log(`[Tickets] [API] Ticket #${id} -> ${status}`);
      return true;
    } catch (error) {
      this.degrade(`Failed to update ticket #${id} (${describe(error)}), applying locally`);
      this.applyLocally(id, status, payload);
      return false;
    }
  }

  coordinatesOf(ticket: Ticket): Position {
    return { x: ticket.coordinates.x, y: ticket.coordinates.y };
  }

  private applyLocally(id: number, status: TicketStatus, payload?: TicketPayload): boolean {
    const ticket = this.fallback.find((t) => t.id === id);
    if (!ticket) {
      return false;
    }
    ticket.status = status;
    if (payload) {
      ticket.payload = { ...payload };
    }
    return true;
  }

  private degrade(message: string): void {
    console.warn(`[Tickets] ${message}`);
    this._simulation = true;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
