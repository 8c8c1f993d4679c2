/**
 * HTTP client for the monitoring ticket service.
 * Talks to `GET /tickets` and `PUT /tickets/:id` with basic auth.
 */

import { TICKET_STATUSES, type Ticket, type TicketPayload, type TicketStatus } from "./types";

export interface TicketClientConfig {
  baseUrl: string;
  username: string;
  password: string;
  timeout?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTicketStatus(value: unknown): value is TicketStatus {
  return TICKET_STATUSES.some((status) => status === value);
}

/**
 * Validate one ticket as received from the service.
 */
export function parseTicket(raw: unknown): Ticket {
  if (!isRecord(raw)) {
    throw new Error("Malformed ticket: expected an object");
  }

  const { id, title, description, status, coordinates, payload } = raw;
  if (typeof id !== "number" || !Number.isInteger(id)) {
    throw new Error(`Malformed ticket: invalid id ${String(id)}`);
  }
  if (typeof title !== "string") {
    throw new Error(`Malformed ticket #${id}: missing title`);
  }
  if (!isTicketStatus(status)) {
    throw new Error(`Malformed ticket #${id}: unknown status ${String(status)}`);
  }
  if (!isRecord(coordinates) || !Number.isInteger(coordinates.x) || !Number.isInteger(coordinates.y)) {
    throw new Error(`Malformed ticket #${id}: invalid coordinates`);
  }
  const x = Number(coordinates.x);
  const y = Number(coordinates.y);

  return {
    id,
    title,
    description: typeof description === "string" ? description : "",
    status,
    coordinates: { x, y },
    payload: isRecord(payload) ? { ...payload } : null,
  };
}

export class TicketClient {
  private baseUrl: string;
  private authorization: string;
  private timeout: number;

  constructor(config: TicketClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.authorization = `Basic ${Buffer.from(`${config.username}:${config.password}`).toString("base64")}`;
    this.timeout = config.timeout || 5000;
  }

  /**
   * Fetch every ticket known to the service.
   */
  async listTickets(): Promise<Ticket[]> {
    const body = await this.request("GET", "/tickets");
    if (!Array.isArray(body)) {
      throw new Error("Ticket API returned a non-array ticket list");
    }
    return body.map(parseTicket);
  }

  /**
   * Change one ticket's status, attaching `payload` when given.
   */
  async updateTicket(id: number, status: TicketStatus, payload?: TicketPayload): Promise<void> {
    await this.request("PUT", `/tickets/${id}`, payload ? { status, payload } : { status });
  }

  private async request(method: "GET" | "PUT", path: string, body?: unknown): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: {
          "Content-Type": "application/json",
          Authorization: this.authorization,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new Error(`Ticket API error: ${response.status} - ${error}`);
      }

      const text = await response.text();
      return text ? JSON.parse(text) : null;
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new Error("Ticket request timed out");
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
