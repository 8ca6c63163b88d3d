import { createHmac, timingSafeEqual } from 'crypto';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export const TICKET_TOKEN_VERSION = 1;
export const MIN_SECRET_BYTES = 32;
export const TOKEN_VALIDITY_AFTER_EVENT_MS = 24 * 60 * 60 * 1000;

export interface TicketTokenInput {
  eventId: string;
  ticketId: string;
  uniqueCode: string;
  eventDate: Date;
}

export interface TicketTokenPayload {
  version: number;
  eventId: string;
  ticketId: string;
  uniqueCode: string;
  /** Epoch milliseconds, UTC. */
  expiry: number;
}

export type TokenRejection =
  | 'malformed'
  | 'signature_invalid'
  | 'unsupported_version'
  | 'expired';

export type TokenVerification =
  | { isValid: true; payload: TicketTokenPayload }
  | { isValid: false; reason: TokenRejection; message: string };

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function decodeBase64(value: unknown): Buffer | null {
  if (typeof value !== 'string' || value.length % 4 !== 0) return null;
  if (!BASE64.test(value)) return null;
  const decoded = Buffer.from(value, 'base64');
  // Unused trailing bits must be zero, so each byte string has one encoding.
  return decoded.toString('base64') === value ? decoded : null;
}

function rejected(reason: TokenRejection, message: string): TokenVerification {
  return { isValid: false, reason, message };
}

/**
 * HMAC-SHA256 signer/verifier for the credential embedded in ticket QR codes.
 *
 * Token layout: `{"payload":"<base64 JSON>","signature":"<base64 MAC>"}`.
 * Signing has no nonce, so the same ticket always yields the same token and
 * the QR image can be regenerated instead of stored.
 */
@Injectable()
export class TicketTokenService {
  private readonly signingKey: Buffer;

  constructor(configService: ConfigService) {
    const secret = configService.get<string>('TICKET_SIGNING_SECRET');
    if (!secret) {
      throw new Error(
        'TICKET_SIGNING_SECRET is not configured. Generate one with: openssl rand -base64 48',
      );
    }

    this.signingKey = Buffer.from(secret, 'utf8');
    if (this.signingKey.length < MIN_SECRET_BYTES) {
      throw new Error(
        `TICKET_SIGNING_SECRET must be at least ${MIN_SECRET_BYTES} bytes. Current length: ${this.signingKey.length}`,
      );
    }
  }

  sign(input: TicketTokenInput): string {
    const payload: TicketTokenPayload = {
      version: TICKET_TOKEN_VERSION,
      eventId: input.eventId,
      ticketId: input.ticketId,
      uniqueCode: input.uniqueCode,
      expiry: input.eventDate.getTime() + TOKEN_VALIDITY_AFTER_EVENT_MS,
    };

    const payloadBytes = Buffer.from(JSON.stringify(payload), 'utf8');

    return JSON.stringify({
      payload: payloadBytes.toString('base64'),
      signature: this.mac(payloadBytes).toString('base64'),
    });
  }

  verify(token: string, now: Date = new Date()): TokenVerification {
    const container = parseJson(token);
    if (!isRecord(container)) {
      return rejected('malformed', 'Malformed token');
    }

    const payloadBytes = decodeBase64(container.payload);
    const providedSignature = decodeBase64(container.signature);
    if (!payloadBytes || !providedSignature) {
      return rejected('malformed', 'Malformed token');
    }

    // timingSafeEqual requires equal lengths; a short MAC is still a forgery.
    const expectedSignature = this.mac(payloadBytes);
    if (
      providedSignature.length !== expectedSignature.length ||
      !timingSafeEqual(expectedSignature, providedSignature)
    ) {
      return rejected(
        'signature_invalid',
        'Invalid signature - token may be forged or tampered',
      );
    }

    const decoded = parseJson(payloadBytes.toString('utf8'));
    if (!isRecord(decoded)) {
      return rejected('malformed', 'Invalid payload');
    }

    if (decoded.version !== TICKET_TOKEN_VERSION) {
      return rejected(
        'unsupported_version',
        `Unsupported token version: ${String(decoded.version)}`,
      );
    }

    const { eventId, ticketId, uniqueCode, expiry } = decoded;
    if (
      typeof eventId !== 'string' ||
      typeof ticketId !== 'string' ||
      typeof uniqueCode !== 'string' ||
      typeof expiry !== 'number' ||
      !Number.isFinite(expiry)
    ) {
      return rejected('malformed', 'Invalid payload');
    }

    if (now.getTime() > expiry) {
      return rejected(
        'expired',
        `Token expired on ${new Date(expiry).toISOString()}`,
      );
    }

    return {
      isValid: true,
      payload: {
        version: TICKET_TOKEN_VERSION,
        eventId,
        ticketId,
        uniqueCode,
        expiry,
      },
    };
  }

  private mac(payloadBytes: Buffer): Buffer {
    return createHmac('sha256', this.signingKey).update(payloadBytes).digest();
  }
}
