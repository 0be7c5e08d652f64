/**
 * Sesiones por job para invalidar callbacks al pausar, cancelar o reanudar.
 *
 * createSession(jobId) genera un sessionId único por admisión; isCurrent(jobId, sessionId)
 * indica si la sesión sigue siendo la activa. El progreso o el resultado de un worker cuya
 * sesión ya no es la actual se ignora.
 *
 * @module engines/SessionManager
 */

export class SessionManager {
  private sessions = new Map<string, string>();
  private counter = 0;

  createSession(jobId: string): string {
    this.counter++;
    const sessionId = `${Date.now()}-${this.counter}-${Math.random().toString(36).substring(2, 8)}`;
    this.sessions.set(jobId, sessionId);
    return sessionId;
  }

  invalidate(jobId: string): void {
    this.sessions.delete(jobId);
  }

  isCurrent(jobId: string, sessionId: string): boolean {
    return this.sessions.get(jobId) === sessionId;
  }

  clear(): void {
    this.sessions.clear();
  }
}

export default SessionManager;
