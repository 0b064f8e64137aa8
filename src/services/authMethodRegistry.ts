/**
 * Per-user catalog of authentication methods.
 *
 * Enrollment validates metadata against the method type and refuses a
 * second enrollment of the same phone number, email address, credential
 * or provider account. Methods are never deleted; disabling is a status
 * change. Every mutation names the {@link Actor} performing it.
 *
 * @module services/authMethodRegistry
 */

import type {
  Actor,
  AuthMethodType,
  AuthMethodView,
  AuthenticationMethod,
  SecurityLevel,
} from '../types/index.js';
import type { DocumentStore } from '../store/documentStore.js';
import {
  buildMetadata,
  enrollmentKey,
  isConfigured,
  maskedIdentifier,
  maxSecurityLevel,
  methodLabel,
  securityLevel,
  withVerified,
} from '../policy/authMethodPolicy.js';
import { InvalidRequestError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';

export interface AuthMethodRegistryOptions {
  logger?: Logger;
  now?: () => Date;
}

export class AuthMethodRegistry {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly methods: DocumentStore<AuthenticationMethod>,
    options: AuthMethodRegistryOptions = {},
  ) {
    this.logger = (options.logger ?? silentLogger).child({ component: 'authMethodRegistry' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Enroll a new method for `userId`.
   *
   * @throws {InvalidMetadataError} When `metadata` does not fit `type`
   * @throws {InvalidRequestError} When the user id is blank or the method is already enrolled
   */
  async register(
    userId: string,
    type: AuthMethodType,
    metadataInput: unknown,
    actor: Actor,
    displayName?: string,
  ): Promise<AuthenticationMethod> {
    if (userId.trim().length === 0) {
      throw new InvalidRequestError('userId is required', { userId: ['is required'] });
    }
    const metadata = buildMetadata(type, metadataInput);

    const key = enrollmentKey(metadata);
    const existing = await this.methods.find({ equals: { userId, type } });
    if (existing.some((method) => enrollmentKey(method.metadata) === key)) {
      throw new InvalidRequestError(`${methodLabel(type)} is already enrolled for this user`, {
        metadata: ['duplicates an enrolled method'],
      });
    }

    const now = this.now();
    const method = await this.methods.create({
      userId,
      type,
      displayName:
        displayName?.trim() ||
        (metadata.kind === 'PASSKEY' ? metadata.deviceName : null) ||
        methodLabel(type),
      enabled: true,
      lastUsedAt: null,
      metadata,
      createdAt: now,
      updatedAt: now,
      createdBy: actor.id,
      updatedBy: actor.id,
    });

    this.logger.info('Authentication method registered', {
      methodId: method.id,
      userId,
      type,
      actor: actor.id,
    });
    return method;
  }

  isConfigured(method: AuthenticationMethod): boolean {
    return isConfigured(method.metadata);
  }

  securityLevel(type: AuthMethodType): SecurityLevel {
    return securityLevel(type);
  }

  maskedIdentifier(method: AuthenticationMethod): string {
    return maskedIdentifier(method);
  }

  async get(methodId: string): Promise<AuthenticationMethod | null> {
    return this.methods.get(methodId);
  }

  /** Every method of the user, oldest first, with derived fields projected. */
  async list(userId: string): Promise<AuthMethodView[]> {
    const methods = await this.methods.find({ equals: { userId }, orderBy: 'createdAt' });
    return methods.map((method) => toView(method));
  }

  /** The passkey method owning `credentialId`, if the user has one. */
  async findByCredentialId(userId: string, credentialId: string): Promise<AuthenticationMethod | null> {
    const passkeys = await this.methods.find({ equals: { userId, type: 'PASSKEY' } });
    return (
      passkeys.find(
        (method) => method.metadata.kind === 'PASSKEY' && method.metadata.credentialId === credentialId,
      ) ?? null
    );
  }

  /** The SMS or email method bound to a normalised phone number or address. */
  async findByIdentifier(
    userId: string,
    type: 'SMS_OTP' | 'EMAIL_OTP',
    identifier: string,
  ): Promise<AuthenticationMethod | null> {
    const candidates = await this.methods.find({ equals: { userId, type } });
    return candidates.find((method) => enrollmentKey(method.metadata) === identifier) ?? null;
  }

  /**
   * Set `lastUsedAt` to now. Only enabled methods are touched; returns
   * null for a disabled or missing method.
   */
  async recordUse(method: AuthenticationMethod, actor: Actor): Promise<AuthenticationMethod | null> {
    const now = this.now();
    const updated = await this.methods.conditionalUpdate(
      method.id,
      { enabled: true },
      { lastUsedAt: now, updatedAt: now, updatedBy: actor.id },
    );
    if (!updated) {
      this.logger.warn('Use not recorded for disabled or missing method', { methodId: method.id });
    }
    return updated;
  }

  /** Set the metadata `verified` flag (a no-op for passkeys). */
  async markVerified(method: AuthenticationMethod, actor: Actor): Promise<AuthenticationMethod | null> {
    const updated = await this.methods.conditionalUpdate(
      method.id,
      { userId: method.userId },
      { metadata: withVerified(method.metadata), updatedAt: this.now(), updatedBy: actor.id },
    );
    if (updated) {
      this.logger.info('Authentication method verified', { methodId: method.id, actor: actor.id });
    }
    return updated;
  }

  async setEnabled(
    methodId: string,
    enabled: boolean,
    actor: Actor,
  ): Promise<AuthenticationMethod | null> {
    const updated = await this.methods.conditionalUpdate(
      methodId,
      {},
      { enabled, updatedAt: this.now(), updatedBy: actor.id },
    );
    if (updated) {
      this.logger.info(enabled ? 'Authentication method enabled' : 'Authentication method disabled', {
        methodId,
        actor: actor.id,
      });
    }
    return updated;
  }

  /** Strongest enabled, configured method of the user; null when there is none. */
  async highestSecurityLevel(userId: string): Promise<SecurityLevel | null> {
    const methods = await this.methods.find({ equals: { userId, enabled: true } });
    return methods
      .filter((method) => isConfigured(method.metadata))
      .map((method) => securityLevel(method.type))
      .reduce<SecurityLevel | null>((best, level) => (best ? maxSecurityLevel(best, level) : level), null);
  }
}

export function toView(method: AuthenticationMethod): AuthMethodView {
  return {
    id: method.id,
    userId: method.userId,
    type: method.type,
    displayName: method.displayName,
    enabled: method.enabled,
    lastUsedAt: method.lastUsedAt,
    createdAt: method.createdAt,
    maskedIdentifier: maskedIdentifier(method),
    securityLevel: securityLevel(method.type),
    configured: isConfigured(method.metadata),
  };
}
