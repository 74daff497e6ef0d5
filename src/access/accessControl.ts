import type { SenderIdentity } from '../types';

function normalizeEntries(entries: string[]): Set<string> {
  return new Set(
    entries
      .map(entry => entry.trim().replace(/^@/, ''))
      .filter(entry => entry.length > 0)
  );
}

/**
 * Allow-list gates. An empty list lets everyone through; otherwise the
 * sender must be listed by handle (with or without '@') or by user ID.
 */
export class AccessControl {
  private readonly allowed: Set<string>;
  private readonly admins: Set<string>;

  constructor(allowedHandles: string[] = [], adminHandles: string[] = []) {
    this.allowed = normalizeEntries(allowedHandles);
    this.admins = normalizeEntries(adminHandles);
  }

  /**
   * May start, stop or reset the whole chat
   */
  canManage(identity: SenderIdentity): boolean {
    return this.admins.size === 0 || AccessControl.isListed(this.admins, identity);
  }

  /**
   * May be tracked, view stats and reset their own stats
   */
  canUse(identity: SenderIdentity): boolean {
    return this.allowed.size === 0 || AccessControl.isListed(this.allowed, identity);
  }

  private static isListed(list: Set<string>, identity: SenderIdentity): boolean {
    if (list.has(identity.userId)) {
      return true;
    }
    const handle = identity.handle?.replace(/^@/, '');
    return !!handle && list.has(handle);
  }
}
