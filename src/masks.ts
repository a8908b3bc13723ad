import type { RequestName, WhoisResult } from './events.js';
import type { Transport } from './transport.js';

/** Mode changes that have a dedicated op request. Everything else goes through op.mode. */
export const MODE_REQUESTS = {
  '+b': 'op.ban',
  '-b': 'op.unban',
  '+q': 'op.quiet',
  '-q': 'op.unquiet',
  '+o': 'op.op',
  '-o': 'op.deop',
  '+v': 'op.voice',
  '-v': 'op.devoice',
} as const satisfies Record<string, RequestName>;

export type TargetedModeSpec = keyof typeof MODE_REQUESTS;
export type TargetedModeRequest = (typeof MODE_REQUESTS)[TargetedModeSpec];

export function isTargetedMode(modeSpec: string): modeSpec is TargetedModeSpec {
  return Object.hasOwn(MODE_REQUESTS, modeSpec);
}

export function modeRequestFor(modeSpec: string): TargetedModeRequest | undefined {
  return isTargetedMode(modeSpec) ? MODE_REQUESTS[modeSpec] : undefined;
}

/** "+q" → "-q", "-o" → "+o". */
export function reverseMode(modeSpec: string): string {
  const sign = modeSpec.charAt(0);
  if ((sign !== '+' && sign !== '-') || modeSpec.length < 2) {
    throw new Error(`Not a mode change: ${modeSpec}`);
  }
  return (sign === '+' ? '-' : '+') + modeSpec.slice(1);
}

/** Already a nick!user@host mask, or an extended ban. */
export function looksLikeMask(target: string): boolean {
  return (target.includes('!') && target.includes('@')) || target.startsWith('$');
}

// gateway/web/<network>/ip.<address>
const WEB_GATEWAY = /^gateway\/web\/[^/]+\/ip\.(.+)$/;

/** Build the ban/quiet mask for a whois result. */
export function maskFor(whois: WhoisResult): string {
  const webIp = WEB_GATEWAY.exec(whois.host)?.[1];
  if (webIp !== undefined) {
    return `*!*@${webIp}`;
  }
  if (whois.host.startsWith('gateway/')) {
    // Shared gateway host: the username is the only thing telling users apart
    return `*!${whois.username}@gateway/*`;
  }
  return `*!*@${whois.host}`;
}

/**
 * Turn a nick into a mask matching every client from the same host. Masks
 * and extended bans are returned unchanged. Rejects with NoSuchTargetError or
 * LookupTimedOutError from the directory lookup.
 */
export async function resolveTarget(transport: Transport, target: string): Promise<string> {
  if (looksLikeMask(target)) {
    return target;
  }
  const whois = await transport.issueRequest('directory.whois', { nick: target });
  return maskFor(whois);
}

/**
 * Apply one mode change through the op provider: the dedicated request when
 * there is one, op.mode otherwise. An empty or null param means none.
 */
export async function applyModeChange(
  transport: Transport,
  channel: string,
  modeSpec: string,
  param: string | null,
): Promise<void> {
  const request = modeRequestFor(modeSpec);
  if (request !== undefined && param) {
    await transport.issueRequest(request, { channel, target: param });
  } else {
    await transport.issueRequest('op.mode', { channel, mode: modeSpec, param: param || null });
  }
}
