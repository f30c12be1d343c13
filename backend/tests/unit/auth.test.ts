import { describe, it, expect, beforeEach } from 'vitest';
import { AuthService } from '../../src/services/auth.js';

describe('AuthService', () => {
  let auth: AuthService;

  beforeEach(() => {
    auth = new AuthService();
  });

  it('issues a token for valid credentials', () => {
    const result = auth.login('t001', 'teach123');
    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.message).toBe('Welcome, Dr. Amanda Johnson!');
    expect(result.user).toEqual({ id: 't001', name: 'Dr. Amanda Johnson', role: 'teacher' });
    expect(auth.getSessionUser(result.token)).toEqual(result.user);
  });

  it('rejects unknown ids and wrong passwords alike', () => {
    expect(auth.login('nobody', 'teach123')).toEqual({ success: false, message: 'Invalid user ID or password' });
    expect(auth.login('s001', 'teach123')).toEqual({ success: false, message: 'Invalid user ID or password' });
  });

  it('ends the earlier session when a user logs in again', () => {
    const first = auth.login('s001', 'student123');
    const second = auth.login('s001', 'student123');
    if (!first.success || !second.success) throw new Error('login failed');

    expect(first.token).not.toBe(second.token);
    expect(auth.getSessionUser(first.token)).toBeUndefined();
    expect(auth.getSessionUser(second.token)?.id).toBe('s001');
    expect(auth.sessionCount).toBe(1);
  });

  it('keeps sessions of different users apart', () => {
    const teacher = auth.login('t001', 'teach123');
    const student = auth.login('s001', 'student123');
    if (!teacher.success || !student.success) throw new Error('login failed');

    expect(auth.sessionCount).toBe(2);
    auth.logout(student.token);
    expect(auth.getSessionUser(teacher.token)?.id).toBe('t001');
    expect(auth.sessionCount).toBe(1);
  });

  it('ends the session on logout', () => {
    const result = auth.login('s002', 'student123');
    if (!result.success) throw new Error('login failed');

    expect(auth.logout(result.token)).toBe('Goodbye, Sarah Williams!');
    expect(auth.getSessionUser(result.token)).toBeUndefined();
    expect(auth.logout(result.token)).toBe('No user logged in');
  });

  it('accepts a custom credential table', () => {
    const custom = new AuthService([{ id: 'x1', name: 'Test User', role: 'student', password: 'test-secret' }]);
    expect(custom.login('x1', 'test-secret').success).toBe(true);
    expect(custom.login('t001', 'teach123').success).toBe(false);
  });
});
