/**
 * @eagerwire/core - User Application Example
 *
 * Demonstrates:
 * - Capabilities declared next to their interfaces
 * - `@Component` / `@Inject` discovery
 * - A manifest entry for a component without a class
 * - Eager initialization and cycle reporting
 */

// CRITICAL: Import reflect-metadata before any decorated class
import 'reflect-metadata';

import {
  CircularDependencyError,
  Component,
  Container,
  DecoratorSource,
  Inject,
  ManifestSource,
  createCapability,
  defineComponent,
} from '../src/index';

// ==================== Capabilities ====================

interface User {
  id: number;
  name: string;
  email: string;
}

interface UserRepository {
  save(user: User): void;
  findById(id: number): User | undefined;
}
const UserRepository = createCapability<UserRepository>('UserRepository');

interface Emailer {
  sendWelcomeEmail(user: User): void;
}
const Emailer = createCapability<Emailer>('Emailer');

interface UserService {
  createUser(name: string, email: string): User;
  getUser(id: number): User | undefined;
}
const UserService = createCapability<UserService>('UserService');

interface MailSettings {
  sender: string;
}
const MailSettings = createCapability<MailSettings>('MailSettings');

// ==================== Components ====================

@Component({ provides: [UserRepository] })
class InMemoryUserRepository implements UserRepository {
  private readonly users = new Map<number, User>();

  save(user: User): void {
    this.users.set(user.id, user);
  }

  findById(id: number): User | undefined {
    return this.users.get(id);
  }
}

@Component({ provides: [Emailer] })
class ConsoleEmailer implements Emailer {
  constructor(@Inject(MailSettings) private readonly settings: MailSettings) {}

  sendWelcomeEmail(user: User): void {
    console.log(`  [mail] ${this.settings.sender} -> ${user.email}: Welcome, ${user.name}!`);
  }
}

@Component({ provides: [UserService] })
class DefaultUserService implements UserService {
  private nextId = 1;

  constructor(
    @Inject(UserRepository) private readonly repository: UserRepository,
    @Inject(Emailer) private readonly emailer: Emailer,
  ) {}

  createUser(name: string, email: string): User {
    const user = { id: this.nextId++, name, email };
    this.repository.save(user);
    this.emailer.sendWelcomeEmail(user);
    return user;
  }

  getUser(id: number): User | undefined {
    return this.repository.findById(id);
  }
}

// Needs UserService, which needs Emailer: a cycle
@Component({ provides: [Emailer] })
class AuditingEmailer implements Emailer {
  constructor(@Inject(UserService) private readonly users: UserService) {}

  sendWelcomeEmail(user: User): void {
    this.users.getUser(user.id);
  }
}

const mailSettings = defineComponent({
  name: 'StaticMailSettings',
  provides: [MailSettings],
  factory: (): MailSettings => ({ sender: 'noreply@example.com' }),
});

// ==================== Main ====================

function main(): void {
  console.log('═══════════════════════════════════════════════════════════');
  console.log('  Eager container demo');
  console.log('═══════════════════════════════════════════════════════════\n');

  console.log('--- Valid arrangement ---');
  const container = new Container({ name: 'users' }).bootstrap(
    new ManifestSource([mailSettings], 'settings'),
    new DecoratorSource(
      [InMemoryUserRepository, ConsoleEmailer, DefaultUserService],
      'users',
    ),
  );

  console.log('Construction order:');
  for (const line of container.describe()) {
    console.log(`  ${line}`);
  }

  const users = container.getInstance(UserService);
  const created = users.createUser('Alice', 'alice@example.com');
  console.log('Lookup:', JSON.stringify(users.getUser(created.id)));
  console.log();

  console.log('--- Circular arrangement ---');
  const broken = new Container({ name: 'broken' });
  try {
    broken.bootstrap(
      new DecoratorSource([
        InMemoryUserRepository,
        AuditingEmailer,
        DefaultUserService,
      ]),
    );
  } catch (error) {
    if (!(error instanceof CircularDependencyError)) {
      throw error;
    }
    console.log(`Caught ${error.name}: ${error.path.join(' → ')}`);
  }

  console.log('\n═══════════════════════════════════════════════════════════');
  console.log('  Demo Complete!');
  console.log('═══════════════════════════════════════════════════════════\n');
}

// Run
main();
