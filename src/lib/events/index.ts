import EventEmitter from "eventemitter3";

/**
 * Typed single-payload event emitter over eventemitter3.
 *
 * `TEvents` maps event names to payload types. Handlers run synchronously in
 * registration order; a throwing handler is reported through `onHandlerError`
 * and never prevents the remaining handlers from running or reaches the
 * emitting ledger operation.
 *
 * @example
 * ```ts
 * type Events = { converted: { user: UserId; amountOut: bigint } };
 * const emitter = new TypedEmitter<Events>();
 * const off = emitter.on("converted", (e) => console.log(e.amountOut));
 * emitter.emit("converted", { user, amountOut: 5n });
 * off();
 * ```
 */
export class TypedEmitter<TEvents extends object> {
	private readonly ee = new EventEmitter();
	private readonly onHandlerError: ((error: unknown, event: string) => void) | null;

	constructor(onHandlerError?: (error: unknown, event: string) => void) {
		this.onHandlerError = onHandlerError ?? null;
	}

	/** Subscribe; returns an unsubscribe function. */
	on<K extends keyof TEvents & string>(event: K, handler: (payload: TEvents[K]) => void): () => void {
		const guarded = this.guard(event, handler);
		this.ee.on(event, guarded);
		return () => {
			this.ee.off(event, guarded);
		};
	}

	/** Subscribe for the next emission only. */
	once<K extends keyof TEvents & string>(event: K, handler: (payload: TEvents[K]) => void): void {
		this.ee.once(event, this.guard(event, handler));
	}

	/** @returns whether any handler was registered for the event */
	emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
		return this.ee.emit(event, payload);
	}

	removeAllListeners<K extends keyof TEvents & string>(event?: K): void {
		if (event) {
			this.ee.removeAllListeners(event);
		} else {
			this.ee.removeAllListeners();
		}
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}

	private guard<K extends keyof TEvents & string>(
		event: K,
		handler: (payload: TEvents[K]) => void,
	): (payload: TEvents[K]) => void {
		return (payload) => {
			try {
				handler(payload);
			} catch (error: unknown) {
				this.onHandlerError?.(error, event);
			}
		};
	}
}
