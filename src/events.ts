import { ulid } from 'ulid';

/**
 * Event payloads by event type. Plugins contributing new event types extend
 * this interface through declaration merging:
 *
 *   declare module '../events.js' {
 *     interface EventMap { 'weather.report': { city: string } }
 *   }
 */
export interface EventMap {
  /** A channel mode was observed to change. `arg` is null for parameterless modes. */
  'mode.changed': { channel: string; mode: string; set: boolean; arg: string | null };
  /** The protocol client saw the topic of a channel (on join, on change, or in reply to a fetch). */
  'topic.updated': { channel: string; topic: string };
  /** An authorized user invoked a bot command. `channel` is null for private messages. */
  'command.invoked': { channel: string | null; user: string; command: string; args: string };
  /** Ask the protocol client to deliver a message to a channel or nick. */
  'message.send': { target: string; message: string };
}

export type EventType = keyof EventMap;

export interface BotEvent<K extends EventType = EventType> {
  id: string;
  type: K;
  timestamp: string;
  data: EventMap[K];
}

export function makeEvent<K extends EventType>(type: K, data: EventMap[K]): BotEvent<K> {
  return {
    id: ulid(),
    type,
    timestamp: new Date().toISOString(),
    data,
  };
}

export interface WhoisResult {
  nick: string;
  username: string;
  host: string;
}

/**
 * Named requests by name: argument object and resolved result. Extended by
 * declaration merging, like EventMap.
 */
export interface RequestMap {
  'op.ban': { args: { channel: string; target: string }; result: void };
  'op.unban': { args: { channel: string; target: string }; result: void };
  'op.quiet': { args: { channel: string; target: string }; result: void };
  'op.unquiet': { args: { channel: string; target: string }; result: void };
  'op.op': { args: { channel: string; target: string }; result: void };
  'op.deop': { args: { channel: string; target: string }; result: void };
  'op.voice': { args: { channel: string; target: string }; result: void };
  'op.devoice': { args: { channel: string; target: string }; result: void };
  'op.kick': { args: { channel: string; target: string; reason: string | null }; result: void };
  'op.mode': { args: { channel: string; mode: string; param: string | null }; result: void };
  'directory.whois': { args: { nick: string }; result: WhoisResult };
  'protocol.fetchTopic': { args: { channel: string }; result: void };
  'protocol.setTopic': { args: { channel: string; topic: string }; result: void };
  'protocol.queryChanMode': { args: { channel: string }; result: { modes: string } };
  'admin.timedQuiet': {
    args: { channel: string; target: string; duration: number | string };
    result: void;
  };
}

export type RequestName = keyof RequestMap;
export type RequestArgs<K extends RequestName> = RequestMap[K]['args'];
export type RequestResult<K extends RequestName> = RequestMap[K]['result'];
