import { NotImplementedError } from './errors.js';
import { logger } from './logger.js';
import type {
  BotEvent,
  EventType,
  RequestArgs,
  RequestName,
  RequestResult,
} from './events.js';

export type PluginState = 'constructed' | 'configured' | 'started' | 'stopped';

/** What the bus needs from a plugin to route events and requests to it. */
export interface PluginEndpoint {
  readonly name: string;
  readonly state: PluginState;
  receivedEvent<K extends EventType>(event: BotEvent<K>): void | Promise<void>;
  /** Return the (possibly modified) event to continue propagation, or null to swallow it. */
  receivedMiddlewareEvent<K extends EventType>(event: BotEvent<K>): BotEvent<K> | null;
  incomingRequest<K extends RequestName>(name: K, args: RequestArgs<K>): Promise<RequestResult<K>>;
}

/**
 * The call contract between plugins and whatever moves events and requests
 * around. The protocol client is just another plugin on the other side.
 */
export interface Transport {
  sendEvent<K extends EventType>(event: BotEvent<K>): void;
  issueRequest<K extends RequestName>(name: K, args: RequestArgs<K>): Promise<RequestResult<K>>;
  listenForEvent(type: EventType, plugin: PluginEndpoint): void;
  installMiddleware(type: EventType, plugin: PluginEndpoint): void;
  providesRequest(name: RequestName, plugin: PluginEndpoint): void;
  /** Remove every listener, middleware and request registration held by the plugin. */
  unhookPlugin(plugin: PluginEndpoint): void;
}

/**
 * In-process transport. Events are delivered synchronously in the order they
 * are sent; middleware runs first, in install order, and may swallow.
 */
export class EventBus implements Transport {
  private listeners = new Map<EventType, PluginEndpoint[]>();
  private middleware = new Map<EventType, PluginEndpoint[]>();
  private providers = new Map<RequestName, PluginEndpoint>();
  private readonly log = logger.child({ component: 'bus' });

  sendEvent<K extends EventType>(event: BotEvent<K>): void {
    let current = event;

    for (const plugin of [...(this.middleware.get(event.type) ?? [])]) {
      if (plugin.state !== 'started') continue;
      let next: BotEvent<K> | null;
      try {
        next = plugin.receivedMiddlewareEvent(current);
      } catch (err) {
        this.log.error({ err, plugin: plugin.name, event: event.type }, 'middleware threw, passing event on unchanged');
        continue;
      }
      if (next === null) {
        this.log.debug({ plugin: plugin.name, event: event.type }, 'event swallowed by middleware');
        return;
      }
      current = next;
    }

    for (const plugin of [...(this.listeners.get(event.type) ?? [])]) {
      if (plugin.state !== 'started') continue;
      try {
        const result = plugin.receivedEvent(current);
        if (result instanceof Promise) {
          result.catch((err: unknown) => {
            this.log.error({ err, plugin: plugin.name, event: event.type }, 'event handler failed');
          });
        }
      } catch (err) {
        this.log.error({ err, plugin: plugin.name, event: event.type }, 'event handler failed');
      }
    }
  }

  async issueRequest<K extends RequestName>(name: K, args: RequestArgs<K>): Promise<RequestResult<K>> {
    const provider = this.providers.get(name);
    if (!provider || provider.state !== 'started') {
      throw new NotImplementedError(`No plugin provides the request '${name}'`);
    }
    this.log.debug({ request: name, provider: provider.name }, 'issuing request');
    return provider.incomingRequest(name, args);
  }

  listenForEvent(type: EventType, plugin: PluginEndpoint): void {
    addUnique(this.listeners, type, plugin);
  }

  installMiddleware(type: EventType, plugin: PluginEndpoint): void {
    addUnique(this.middleware, type, plugin);
  }

  providesRequest(name: RequestName, plugin: PluginEndpoint): void {
    const existing = this.providers.get(name);
    if (existing && existing !== plugin) {
      this.log.warn({ request: name, previous: existing.name, plugin: plugin.name }, 'request provider replaced');
    }
    this.providers.set(name, plugin);
  }

  unhookPlugin(plugin: PluginEndpoint): void {
    for (const table of [this.listeners, this.middleware]) {
      for (const [type, plugins] of table) {
        const remaining = plugins.filter((p) => p !== plugin);
        if (remaining.length === 0) table.delete(type);
        else table.set(type, remaining);
      }
    }
    for (const [name, provider] of this.providers) {
      if (provider === plugin) this.providers.delete(name);
    }
  }

  /** Number of registrations (listeners + middleware + requests) held by a plugin. */
  hookCount(plugin: PluginEndpoint): number {
    let count = 0;
    for (const table of [this.listeners, this.middleware]) {
      for (const plugins of table.values()) {
        if (plugins.includes(plugin)) count++;
      }
    }
    for (const provider of this.providers.values()) {
      if (provider === plugin) count++;
    }
    return count;
  }
}

function addUnique<K>(table: Map<K, PluginEndpoint[]>, key: K, plugin: PluginEndpoint): void {
  const plugins = table.get(key) ?? [];
  if (!plugins.includes(plugin)) plugins.push(plugin);
  table.set(key, plugins);
}
