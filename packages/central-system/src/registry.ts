/**
 * Live sessions keyed by the identity each device reports about itself.
 * Identities are untrusted: a later registration under the same identity
 * replaces the earlier one.
 */
export class PeerRegistry<Session> {
  private readonly sessions = new Map<string, Session>();

  get size(): number {
    return this.sessions.size;
  }

  /** Returns the session that previously held `identity`, if it was a different one. */
  upsert(identity: string, session: Session): Session | undefined {
    for (const [key, existing] of this.sessions) {
      if (existing === session && key !== identity) {
        this.sessions.delete(key);
      }
    }

    const previous = this.sessions.get(identity);
    this.sessions.set(identity, session);
    return previous !== undefined && previous !== session ? previous : undefined;
  }

  lookup(identity: string): Session | undefined {
    return this.sessions.get(identity);
  }

  remove(identity: string): boolean {
    return this.sessions.delete(identity);
  }

  /** Drops every identity that points at `session`; other sessions are untouched. */
  removeSession(session: Session): string[] {
    const removed: string[] = [];
    for (const [identity, existing] of this.sessions) {
      if (existing === session) {
        this.sessions.delete(identity);
        removed.push(identity);
      }
    }
    return removed;
  }

  list(): Array<[string, Session]> {
    return Array.from(this.sessions.entries());
  }
}
