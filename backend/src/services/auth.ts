/**
 * Auth — Static demo credentials and in-memory sessions
 *
 * Users are looked up in a fixed credential table; a successful login issues
 * an opaque bearer token that lives until logout, the user's next login or
 * process exit.
 */
import { v4 as uuidv4 } from 'uuid';

export type UserRole = 'teacher' | 'student';

export interface Credential {
  id: string;
  name: string;
  role: UserRole;
  password: string;
}

export type SessionUser = Omit<Credential, 'password'>;

export type LoginResult =
  | { success: true; message: string; token: string; user: SessionUser }
  | { success: false; message: string };

// Matches the people created by the sample data seed
export const DEMO_CREDENTIALS: Credential[] = [
  { id: 't001', name: 'Dr. Amanda Johnson', role: 'teacher', password: 'teach123' },
  { id: 't002', name: 'Prof. Brian Smith', role: 'teacher', password: 'teach123' },
  { id: 's001', name: 'John Kirk', role: 'student', password: 'student123' },
  { id: 's002', name: 'Sarah Williams', role: 'student', password: 'student123' },
  { id: 's003', name: 'Maria Rodriguez', role: 'student', password: 'student123' },
];

export class AuthService {
  private readonly credentials = new Map<string, Credential>();
  private readonly sessions = new Map<string, SessionUser>();
  // user id -> live token; one session per user
  private readonly tokensByUser = new Map<string, string>();

  constructor(credentials: Credential[] = DEMO_CREDENTIALS) {
    for (const credential of credentials) {
      this.credentials.set(credential.id, credential);
    }
  }

  login(userId: string, password: string): LoginResult {
    const credential = this.credentials.get(userId);
    // Unknown ids and wrong passwords get the same message
    if (!credential || credential.password !== password) {
      return { success: false, message: 'Invalid user ID or password' };
    }

    const user: SessionUser = { id: credential.id, name: credential.name, role: credential.role };
    const previous = this.tokensByUser.get(user.id);
    if (previous) this.sessions.delete(previous);

    const token = uuidv4();
    this.sessions.set(token, user);
    this.tokensByUser.set(user.id, token);
    return { success: true, message: `Welcome, ${user.name}!`, token, user };
  }

  logout(token: string): string {
    const user = this.sessions.get(token);
    if (!user) {
      return 'No user logged in';
    }
    this.sessions.delete(token);
    this.tokensByUser.delete(user.id);
    return `Goodbye, ${user.name}!`;
  }

  getSessionUser(token: string): SessionUser | undefined {
    return this.sessions.get(token);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }
}
