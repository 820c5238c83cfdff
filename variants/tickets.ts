/**
 * Support ticket ordering.
 *
 * A CustomerSupport desk queues tickets and processes them in the order the
 * selected ordering strategy decides: first-in-first-out, last-in-first-out,
 * or shuffled (optionally seeded so the shuffle is reproducible).
 */

import { z } from "zod";
import { fromFunction, type Capability } from "../core/capability.ts";
import { VariantRegistry } from "../core/factory/index.ts";
import { StrategyContext } from "../core/strategy/index.ts";

const ID_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

export interface SupportTicket {
	readonly id: string;
	readonly customer: string;
	readonly issue: string;
}

/**
 * Random uppercase alphanumeric id.
 */
export function generateId(length = 8, random: () => number = Math.random): string {
	let id = "";
	for (let i = 0; i < length; i++) {
		id += ID_ALPHABET.charAt(Math.floor(random() * ID_ALPHABET.length));
	}
	return id;
}

export function createTicket(
	customer: string,
	issue: string,
	random?: () => number,
): SupportTicket {
	return { id: generateId(8, random), customer, issue };
}

/**
 * Deterministic generator in [0, 1) (mulberry32).
 */
export function seededRandom(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

export type TicketOrdering = Capability<readonly SupportTicket[], SupportTicket[]>;

export interface OrderingOptions {
	seed?: number;
}

export const OrderingOptionsSchema = z
	.object({
		seed: z.number().int().optional(),
	})
	.strict();

export const fifoOrdering: TicketOrdering = fromFunction((tickets) => [...tickets]);

export const filoOrdering: TicketOrdering = fromFunction((tickets) => [...tickets].reverse());

/**
 * Fisher-Yates shuffle. With a seed, every call shuffles the same way.
 */
export class RandomOrdering implements TicketOrdering {
	readonly seed: number | undefined;

	constructor(options: OrderingOptions = {}) {
		this.seed = options.seed;
	}

	perform(tickets: readonly SupportTicket[]): SupportTicket[] {
		const random = this.seed === undefined ? Math.random : seededRandom(this.seed);
		const shuffled = [...tickets];
		for (let i = shuffled.length - 1; i > 0; i--) {
			const j = Math.floor(random() * (i + 1));
			const a = shuffled[i];
			const b = shuffled[j];
			if (a !== undefined && b !== undefined) {
				shuffled[i] = b;
				shuffled[j] = a;
			}
		}
		return shuffled;
	}
}

export function createOrderingRegistry(): VariantRegistry<TicketOrdering, OrderingOptions> {
	const registry = new VariantRegistry<TicketOrdering, OrderingOptions>("TicketOrderingRegistry");
	registry.register("fifo", () => fifoOrdering, { description: "Oldest ticket first" });
	registry.register("filo", () => filoOrdering, { description: "Newest ticket first" });
	registry.register("random", (options) => new RandomOrdering(options), {
		description: "Shuffled; pass a seed for a repeatable order",
		schema: OrderingOptionsSchema,
	});
	return registry;
}

/**
 * Support desk that processes its queue through a swappable ordering.
 */
export class CustomerSupport {
	private tickets: SupportTicket[] = [];
	private readonly context: StrategyContext<readonly SupportTicket[], SupportTicket[]>;

	constructor(ordering?: TicketOrdering) {
		this.context = new StrategyContext({ name: "CustomerSupport", strategy: ordering });
	}

	get pending(): readonly SupportTicket[] {
		return [...this.tickets];
	}

	addTicket(ticket: SupportTicket): void {
		this.tickets.push(ticket);
	}

	setOrdering(ordering: TicketOrdering): void {
		this.context.setStrategy(ordering);
	}

	/**
	 * Process and clear the queue. Returns the processed ticket ids in order.
	 * @throws NoStrategySelectedError if no ordering was ever set
	 */
	processTickets(ordering?: TicketOrdering): string[] {
		if (ordering) {
			this.context.setStrategy(ordering);
		}

		const ordered = this.context.execute(this.tickets);
		if (ordered.length === 0) {
			console.log("There are no tickets to process. Well done!");
			return [];
		}

		for (const ticket of ordered) {
			console.log(`[support] Processing ticket ${ticket.id} (${ticket.customer}): ${ticket.issue}`);
		}

		this.tickets = [];
		return ordered.map((ticket) => ticket.id);
	}
}
