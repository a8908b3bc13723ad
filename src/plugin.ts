import { NotImplementedError } from './errors.js';
import { makeEvent } from './events.js';
import { logger, type Logger } from './logger.js';
import type { Clock } from './clock.js';
import type { PluginConfig } from './plugin-config.js';
import type { PluginEndpoint, PluginState, Transport } from './transport.js';
import type {
  BotEvent,
  EventType,
  RequestArgs,
  RequestName,
  RequestResult,
} from './events.js';

export type EventHandler<K extends EventType> = (event: BotEvent<K>) => void | Promise<void>;
export type MiddlewareHandler<K extends EventType> = (event: BotEvent<K>) => BotEvent<K> | null;
export type RequestHandler<K extends RequestName> = (args: RequestArgs<K>) => Promise<RequestResult<K>>;

type RequestTable = { [K in RequestName]?: RequestHandler<K> };

/** The registry as seen from inside a plugin. */
export interface PluginHost {
  readonly clock: Clock;
  /** Prefix users type before a command name, for usage lines. */
  readonly commandPrefix: string;
  getPluginConfig(name: string): PluginConfig;
}

export type PluginClass = new (name: string, transport: Transport, host: PluginHost) => BotPlugin;

export function isEventOf<K extends EventType>(event: BotEvent, type: K): event is BotEvent<K> {
  return event.type === type;
}

/**
 * Base class for every plugin. Handlers are registered per instance during
 * start() and looked up by exact event type or request name on dispatch.
 *
 * Lifecycle: constructed → configured (reload) → started → stopped.
 * The registry performs the first reload() right after construction.
 */
export abstract class BotPlugin implements PluginEndpoint {
  /** Plugins that must be loaded for this one to be usable. Advisory. */
  readonly requires: readonly string[] = [];

  state: PluginState = 'constructed';
  protected readonly log: Logger;

  private _config: PluginConfig | undefined;
  private eventHandlers = new Map<EventType, EventHandler<EventType>>();
  private middlewareHandlers = new Map<EventType, MiddlewareHandler<EventType>>();
  private requestHandlers: RequestTable = {};

  constructor(
    readonly name: string,
    protected readonly transport: Transport,
    protected readonly host: PluginHost,
  ) {
    this.log = logger.child({ plugin: name });
  }

  get config(): PluginConfig {
    if (this._config === undefined) {
      throw new Error(`Plugin ${this.name} used before its first reload()`);
    }
    return this._config;
  }

  protected get clock(): Clock {
    return this.host.clock;
  }

  // ── Lifecycle: override and call super ──

  /** Re-derive runtime state from configuration. Called after construction and whenever the config changes. */
  reload(): void {
    this._config = this.host.getPluginConfig(this.name);
    if (this.state === 'constructed') this.state = 'configured';
  }

  /** Hook into the bus. Subclasses call super.start() first, then register handlers. */
  async start(): Promise<void> {
    if (this.state !== 'configured') {
      throw new Error(`Cannot start plugin ${this.name} from state '${this.state}'`);
    }
    this.state = 'started';
  }

  /** Unhook everything registered in start(). */
  async stop(): Promise<void> {
    this.transport.unhookPlugin(this);
    this.eventHandlers.clear();
    this.middlewareHandlers.clear();
    this.requestHandlers = {};
    this.state = 'stopped';
  }

  // ── Dispatch (called by the transport) ──

  receivedEvent<K extends EventType>(event: BotEvent<K>): void | Promise<void> {
    const handler = this.eventHandlers.get(event.type);
    if (handler) return handler(event);
  }

  receivedMiddlewareEvent<K extends EventType>(event: BotEvent<K>): BotEvent<K> | null {
    const handler = this.middlewareHandlers.get(event.type);
    if (!handler) return event;
    const result = handler(event);
    if (result === null) return null;
    if (!isEventOf(result, event.type)) {
      throw new Error(`Middleware for '${event.type}' in ${this.name} returned a '${result.type}' event`);
    }
    return result;
  }

  incomingRequest<K extends RequestName>(name: K, args: RequestArgs<K>): Promise<RequestResult<K>> {
    const handler = this.requestHandlers[name];
    if (!handler) {
      return Promise.reject(new NotImplementedError(`The plugin ${this.name} does not provide the request '${name}'`));
    }
    return handler(args);
  }

  // ── Registration helpers (use from start()) ──

  protected listenForEvent<K extends EventType>(type: K, handler: EventHandler<K>): void {
    this.eventHandlers.set(type, (event) => {
      if (isEventOf(event, type)) return handler(event);
    });
    this.transport.listenForEvent(type, this);
  }

  protected installMiddleware<K extends EventType>(type: K, handler: MiddlewareHandler<K>): void {
    this.middlewareHandlers.set(type, (event) => (isEventOf(event, type) ? handler(event) : event));
    this.transport.installMiddleware(type, this);
  }

  protected providesRequest<K extends RequestName>(name: K, handler: RequestHandler<K>): void {
    const table: { [P in K]?: RequestHandler<P> } = this.requestHandlers;
    table[name] = handler;
    this.transport.providesRequest(name, this);
  }

  protected sendMessage(target: string, message: string): void {
    this.transport.sendEvent(makeEvent('message.send', { target, message }));
  }
}
