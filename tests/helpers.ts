import { randomUUID } from 'crypto';
import { createSqliteDatabase, SqliteDatabase } from '../src/config/sqlite';
import { Role } from '../src/lib/permissions';
import { SqliteWasteRepository } from '../src/repositories/sqlite';
import { NotificationService } from '../src/services/notificationService';
import { PhotoStorage } from '../src/services/photoStorage';
import { ReportLifecycle } from '../src/services/reportLifecycle';
import { Actor, PhotoUpload, User } from '../src/types';
import { Clock, HOUR_MS } from '../src/utils/clock';
import { CodeGenerator } from '../src/utils/confirmationCode';

export const T0 = new Date('2025-03-10T08:00:00.000Z');

export class FixedClock implements Clock {
  constructor(private current: Date = T0) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(date: Date): void {
    this.current = new Date(date.getTime());
  }

  advanceHours(hours: number): void {
    this.current = new Date(this.current.getTime() + hours * HOUR_MS);
  }
}

export class InMemoryPhotoStorage implements PhotoStorage {
  readonly files = new Map<string, Buffer>();
  readonly removed: string[] = [];
  failRemovals = false;
  private counter = 0;

  async upload(content: Buffer, filename: string, folder: string): Promise<string> {
    this.counter += 1;
    const url = `https://photos.test/${folder}/${this.counter}-${filename}`;
    this.files.set(url, content);
    return url;
  }

  async remove(url: string): Promise<void> {
    if (this.failRemovals) {
      throw new Error('storage unavailable');
    }
    this.files.delete(url);
    this.removed.push(url);
  }
}

// Description worth exactly 30 points (length 10, keywords capped at 12,
// quantity 4, comma+period 2, capital 1, exclamation 1)
export const RICH_DESCRIPTION =
  'Tas de déchets plastique devant le marché, environ 3 sacs remplis de bouteilles et de sachets. ' +
  'Dépôt sauvage qui bloque la route principale du quartier!';

export const photo = (filename = 'site.jpg'): PhotoUpload => ({
  filename,
  content: Buffer.from('fake-image-bytes'),
});

export const sequenceCodes = (...codes: string[]): CodeGenerator => {
  let index = 0;
  return () => codes[Math.min(index++, codes.length - 1)];
};

export interface TestContext {
  db: SqliteDatabase;
  repo: SqliteWasteRepository;
  clock: FixedClock;
  photos: InMemoryPhotoStorage;
  notifications: NotificationService;
  lifecycle: ReportLifecycle;
}

export const createTestContext = (options: { generateCode?: CodeGenerator } = {}): TestContext => {
  const db = createSqliteDatabase(':memory:');
  const repo = new SqliteWasteRepository(db);
  const clock = new FixedClock();
  const photos = new InMemoryPhotoStorage();
  const notifications = new NotificationService(repo, clock);
  const lifecycle = new ReportLifecycle({
    repo,
    photos,
    clock,
    notifications,
    generateCode: options.generateCode,
  });
  return { db, repo, clock, photos, notifications, lifecycle };
};

export const createUser = async (
  ctx: Pick<TestContext, 'repo'>,
  role: Role,
  overrides: Partial<Pick<User, 'commune' | 'fullName' | 'points' | 'subscriptionActive'>> = {}
): Promise<User> =>
  ctx.repo.insertUser({
    id: randomUUID(),
    fullName: overrides.fullName ?? `${role} user`,
    role,
    commune: overrides.commune === undefined ? 'Gombe' : overrides.commune,
    points: overrides.points ?? 0,
    subscriptionActive: overrides.subscriptionActive ?? false,
    createdAt: T0,
  });

export const asActor = (user: User): Actor => ({ id: user.id, role: user.role, commune: user.commune });

export const insertSubscription = (
  db: SqliteDatabase,
  userId: string,
  options: { isActive?: boolean; endDate?: Date | null } = {}
): void => {
  const endDate = options.endDate === undefined ? new Date(T0.getTime() + 30 * 24 * HOUR_MS) : options.endDate;
  db.prepare(
    'INSERT INTO subscriptions (id, user_id, is_active, start_date, end_date) VALUES (?, ?, ?, ?, ?)'
  ).run(randomUUID(), userId, options.isActive === false ? 0 : 1, T0.toISOString(), endDate ? endDate.toISOString() : null);
};

export interface Cast {
  citizen: User;
  collector: User;
  otherCollector: User;
  supervisor: User;
  coordinator: User;
  admin: User;
}

export const createCast = async (ctx: Pick<TestContext, 'repo'>): Promise<Cast> => ({
  citizen: await createUser(ctx, Role.CITIZEN),
  collector: await createUser(ctx, Role.COLLECTOR),
  otherCollector: await createUser(ctx, Role.COLLECTOR),
  supervisor: await createUser(ctx, Role.SUPERVISOR),
  coordinator: await createUser(ctx, Role.COORDINATOR, { commune: 'Lemba' }),
  admin: await createUser(ctx, Role.ADMIN, { commune: null }),
});
