/**
 * User / email / repository components used across container tests.
 *
 * Two arrangements share the same capabilities:
 * - valid: `InMemoryUserRepository`, `RecordingEmailer`, `DefaultUserService`
 * - circular: `UserAwareEmailer` needs `UserService`, which needs `Emailer`
 */

import { Component, Inject, createCapability } from '../../src';

// ============================================================================
// Capabilities
// ============================================================================

export interface UserRepository {
  save(user: string): void;
  findById(id: number): string;
}
export const UserRepository = createCapability<UserRepository>('UserRepository');

export interface Emailer {
  sendWelcomeEmail(user: string): void;
}
export const Emailer = createCapability<Emailer>('Emailer');

export interface UserService {
  createUser(name: string, email: string): string;
  getUser(id: number): string;
}
export const UserService = createCapability<UserService>('UserService');

// ============================================================================
// Components
// ============================================================================

@Component({ provides: [UserRepository] })
export class InMemoryUserRepository implements UserRepository {
  readonly saved: string[] = [];

  save(user: string): void {
    this.saved.push(user);
  }

  findById(id: number): string {
    return `${id}/John/john@example.com`;
  }
}

@Component({ provides: [Emailer] })
export class RecordingEmailer implements Emailer {
  readonly recipients: string[] = [];

  sendWelcomeEmail(user: string): void {
    this.recipients.push(user.split('/')[2]);
  }
}

@Component({ provides: [UserService] })
export class DefaultUserService implements UserService {
  constructor(
    @Inject(UserRepository) readonly repository: UserRepository,
    @Inject(Emailer) readonly emailer: Emailer,
  ) {}

  createUser(name: string, email: string): string {
    const user = `1/${name}/${email}`;
    this.repository.save(user);
    this.emailer.sendWelcomeEmail(user);
    return user;
  }

  getUser(id: number): string {
    return this.repository.findById(id);
  }
}

@Component({ provides: [Emailer] })
export class UserAwareEmailer implements Emailer {
  constructor(@Inject(UserService) readonly users: UserService) {}

  sendWelcomeEmail(user: string): void {
    this.users.getUser(Number(user.split('/')[0]));
  }
}
