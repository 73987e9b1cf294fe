import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SessionStoreService } from './session-store.service';
import { testConfig } from '../../../testing/test-config';

describe('SessionStoreService', () => {
  let store: SessionStoreService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SessionStoreService,
        {
          provide: ConfigService,
          useValue: testConfig({ rag: { maxHistory: 2 } }),
        },
      ],
    }).compile();

    store = module.get<SessionStoreService>(SessionStoreService);
  });

  it('should create distinct session ids', () => {
    const first = store.createSession();
    const second = store.createSession();

    expect(first).toMatch(/^session_[0-9a-f-]{36}$/);
    expect(second).not.toBe(first);
  });

  describe('getHistory', () => {
    it('should return null for an unknown session', () => {
      expect(store.getHistory('session_missing')).toBeNull();
    });

    it('should render each turn as a User/Assistant pair', () => {
      store.addExchange('s1', 'What is foo?', 'Foo is a placeholder.');

      expect(store.getHistory('s1')).toBe(
        'User: What is foo?\nAssistant: Foo is a placeholder.',
      );
    });

    it('should keep only the most recent turns, oldest first', () => {
      store.addExchange('s1', 'q1', 'a1');
      store.addExchange('s1', 'q2', 'a2');
      store.addExchange('s1', 'q3', 'a3');

      expect(store.getHistory('s1')).toBe(
        'User: q2\nAssistant: a2\nUser: q3\nAssistant: a3',
      );
    });

    it('should keep sessions apart', () => {
      store.addExchange('s1', 'q1', 'a1');
      store.addExchange('s2', 'other', 'reply');

      expect(store.getHistory('s1')).toBe('User: q1\nAssistant: a1');
    });
  });

  describe('clearSession', () => {
    it('should drop the history of one session', () => {
      store.addExchange('s1', 'q1', 'a1');
      store.addExchange('s2', 'q2', 'a2');

      store.clearSession('s1');

      expect(store.getHistory('s1')).toBeNull();
      expect(store.getHistory('s2')).toBe('User: q2\nAssistant: a2');
    });

    it('should ignore unknown sessions', () => {
      expect(() => store.clearSession('session_missing')).not.toThrow();
    });
  });

  describe('runExclusive', () => {
    it('should run tasks of one session in arrival order', async () => {
      const events: string[] = [];
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const first = store.runExclusive('s1', async () => {
        events.push('first:start');
        await gate;
        events.push('first:end');
        return 1;
      });
      const second = store.runExclusive('s1', async () => {
        events.push('second:start');
        return 2;
      });

      await Promise.resolve();
      release();

      await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
      expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    });

    it('should not make other sessions wait', async () => {
      const events: string[] = [];
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const slow = store.runExclusive('s1', async () => {
        await gate;
        events.push('s1');
      });
      await store.runExclusive('s2', async () => {
        events.push('s2');
      });
      release();
      await slow;

      expect(events).toEqual(['s2', 's1']);
    });

    it('should keep going after a failed task', async () => {
      const failed = store.runExclusive('s1', async () => {
        throw new Error('boom');
      });
      const next = store.runExclusive('s1', async () => 'ok');

      await expect(failed).rejects.toThrow('boom');
      await expect(next).resolves.toBe('ok');
    });
  });

  it('should drop every session on module destroy', () => {
    store.addExchange('s1', 'q1', 'a1');

    store.onModuleDestroy();

    expect(store.getHistory('s1')).toBeNull();
  });
});
