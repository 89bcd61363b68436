import EventEmitter from "eventemitter3";

/**
 * Event map: keys are event names, values are handler signatures.
 * Example: `{ planned: (plan: DispatchPlan) => void; failed: (err: Error) => void }`
 */
export type EventMap = object;

type EventName<TEvents extends EventMap> = EventEmitter.EventNames<TEvents>;
type Listener<TEvents extends EventMap, K extends EventName<TEvents>> = EventEmitter.EventListener<
	TEvents,
	K
>;

/** What eventemitter3 actually stores: a wrapper that runs one handler in isolation. */
type GuardedListener = (...args: unknown[]) => void;

function channel(event: PropertyKey): string | symbol {
	return typeof event === "number" ? String(event) : event;
}

/**
 * Type-safe event emitter wrapping eventemitter3 with compile-time handler validation.
 *
 * Handlers run in registration order, and a throwing handler does not stop the
 * ones after it. Once every handler has run, `emit` rethrows what was thrown:
 * the error itself when one handler failed, an `AggregateError` when several did.
 *
 * @example
 * ```ts
 * type Events = { planned: (requestId: string) => void; failed: (e: Error) => void };
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("planned", (id) => console.log(id));
 * emitter.emit("planned", "grid_trading-7-ETHUSDT");
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();
	private readonly handlers = new WeakMap<GuardedListener, unknown>();
	/** One failure list per `emit` in progress; nested emits push their own. */
	private readonly failures: unknown[][] = [];

	on<K extends EventName<TEvents>>(event: K, handler: Listener<TEvents, K>): this {
		this.ee.on(channel(event), this.guard(handler));
		return this;
	}

	/** Removes every registration of `handler` for `event`. */
	off<K extends EventName<TEvents>>(event: K, handler: Listener<TEvents, K>): this {
		const name = channel(event);
		for (const listener of this.ee.listeners(name)) {
			if (this.handlers.get(listener) === handler) this.ee.off(name, listener);
		}
		return this;
	}

	/** Registers a handler that is removed after its first invocation. */
	once<K extends EventName<TEvents>>(event: K, handler: Listener<TEvents, K>): this {
		this.ee.once(channel(event), this.guard(handler));
		return this;
	}

	/** Invokes every handler for `event` synchronously; returns false when none are registered. */
	emit<K extends EventName<TEvents>>(event: K, ...args: EventEmitter.EventArgs<TEvents, K>): boolean {
		const failures: unknown[] = [];
		this.failures.push(failures);
		let delivered: boolean;
		try {
			delivered = this.ee.emit(channel(event), ...args);
		} finally {
			this.failures.pop();
		}
		if (failures.length === 1) throw failures[0];
		if (failures.length > 1) {
			throw new AggregateError(failures, `${failures.length} handlers for "${String(event)}" threw`);
		}
		return delivered;
	}

	/** Removes all listeners for a specific event, or all events if none specified. */
	removeAllListeners(event?: EventName<TEvents>): this {
		if (event === undefined) {
			this.ee.removeAllListeners();
		} else {
			this.ee.removeAllListeners(channel(event));
		}
		return this;
	}

	listenerCount(event: EventName<TEvents>): number {
		return this.ee.listenerCount(channel(event));
	}

	private guard<K extends EventName<TEvents>>(handler: Listener<TEvents, K>): GuardedListener {
		const guarded: GuardedListener = (...args) => {
			try {
				Reflect.apply(handler, undefined, args);
			} catch (error: unknown) {
				this.failures[this.failures.length - 1]?.push(error);
			}
		};
		this.handlers.set(guarded, handler);
		return guarded;
	}
}
