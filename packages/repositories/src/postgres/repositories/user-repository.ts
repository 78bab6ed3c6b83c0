import { asc, eq, sql } from 'drizzle-orm';
import { z } from 'zod';
import type { Id, Page, PageRequest, User } from '@waypoint/protocol';
import type { Database } from '../db.js';
import { users } from '../schema/index.js';
import type {
  UserRepository,
  CreateUserInput,
  UpdateUserInput,
  UserFilter,
  PasswordHasher,
} from '../../interfaces/index.js';
import { fields, resolveCreate, resolveUpdate, isEmptyChangeSet } from '../../core/update-resolver.js';
import { selectPage, DEFAULT_PAGE } from '../../core/query-assembler.js';
import { logger } from '../../logger.js';

const log = logger.child({ module: 'users' });

export const userFields = {
  email: fields.text('email', { required: true, email: true, maxLength: 255 }),
  password: fields.text('password', { required: true, minLength: 10, maxLength: 255 }),
  fullName: fields.text('fullName', { maxLength: 255 }),
  isActive: fields.value('isActive', z.boolean(), { required: true, defaultValue: true }),
  isSuperuser: fields.value('isSuperuser', z.boolean(), { required: true, defaultValue: false }),
};

/**
 * Every user column except the password hash
 */
export const userColumns = {
  id: users.id,
  email: users.email,
  fullName: users.fullName,
  isActive: users.isActive,
  isSuperuser: users.isSuperuser,
};

export class PgUserRepository implements UserRepository {
  constructor(
    private db: Database,
    private passwordHasher: PasswordHasher
  ) {}

  async create(input: CreateUserInput): Promise<User> {
    const id = input.id ?? crypto.randomUUID();
    const email = resolveCreate(userFields.email, input.email);
    const password = resolveCreate(userFields.password, input.password);
    const fullName = resolveCreate(userFields.fullName, input.fullName);
    const isActive = resolveCreate(userFields.isActive, input.isActive);
    const isSuperuser = resolveCreate(userFields.isSuperuser, input.isSuperuser);

    const [row] = await this.db
      .insert(users)
      .values({
        id,
        email,
        hashedPassword: await this.passwordHasher.hash(password),
        fullName,
        isActive,
        isSuperuser,
      })
      .returning(userColumns);

    log.debug({ userId: id }, 'created user');
    return row;
  }

  async get(id: Id): Promise<User | null> {
    const [row] = await this.db.select(userColumns).from(users).where(eq(users.id, id));
    return row ?? null;
  }

  async getByEmail(email: string): Promise<User | null> {
    const [row] = await this.db.select(userColumns).from(users).where(eq(users.email, email));
    return row ?? null;
  }

  async authenticate(email: string, password: string): Promise<User | null> {
    const [row] = await this.db
      .select({ ...userColumns, hashedPassword: users.hashedPassword })
      .from(users)
      .where(eq(users.email, email));

    if (!row) {
      log.debug('authentication failed: unknown email');
      return null;
    }

    const { hashedPassword, ...user } = row;
    if (!(await this.passwordHasher.verify(password, hashedPassword))) {
      log.debug({ userId: user.id }, 'authentication failed: wrong password');
      return null;
    }

    return user;
  }

  async list(filter: UserFilter = {}, page: PageRequest = DEFAULT_PAGE): Promise<Page<User>> {
    const { rows, total } = await selectPage(this.db, {
      source: (tx) => tx.select(userColumns).from(users).$dynamic(),
      where: filter.isActive === undefined ? undefined : eq(users.isActive, filter.isActive),
      orderBy: [asc(sql`lower(${users.email})`), asc(users.id)],
      page,
    });

    return { items: rows, total };
  }

  async update(id: Id, input: UpdateUserInput): Promise<void> {
    const password = resolveUpdate(userFields.password, input.password);
    const changes = {
      email: resolveUpdate(userFields.email, input.email),
      fullName: resolveUpdate(userFields.fullName, input.fullName),
      isActive: resolveUpdate(userFields.isActive, input.isActive),
      isSuperuser: resolveUpdate(userFields.isSuperuser, input.isSuperuser),
      hashedPassword:
        password === undefined ? undefined : await this.passwordHasher.hash(password),
    };

    if (isEmptyChangeSet(changes)) {
      log.debug({ userId: id }, 'nothing to update');
      return;
    }

    await this.db.update(users).set(changes).where(eq(users.id, id));
    log.debug({ userId: id, fields: Object.keys(input) }, 'updated user');
  }

  async delete(id: Id): Promise<void> {
    await this.db.delete(users).where(eq(users.id, id));
    log.debug({ userId: id }, 'deleted user');
  }
}
