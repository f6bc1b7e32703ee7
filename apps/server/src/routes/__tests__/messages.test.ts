import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import { MemoryQueueStore } from '@relaunch/test-utils';
import { createApp } from '../../app.js';
import { ProjectRegistry } from '../../services/registry/project-registry.js';
import { Dispatcher } from '../../services/dispatch/dispatcher.js';
import { QueueConsumer } from '../../services/queue/queue-consumer.js';

vi.mock('../../lib/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
  initLogger: vi.fn(),
}));

const SOURCE = 'service:commands';
const TARGET = 'poppit:notifications';

describe('Messages route', () => {
  let store: MemoryQueueStore;
  let dispatcher: Dispatcher;
  let consumer: QueueConsumer;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    vi.clearAllMocks();
    store = new MemoryQueueStore();
    const registry = new ProjectRegistry([
      { repo: 'org/app', dir: '/srv/app', upCommands: ['start.sh'], downCommands: ['stop.sh'] },
    ]);
    dispatcher = new Dispatcher(registry, store, { defaultTargetQueue: TARGET });
    consumer = new QueueConsumer(store, dispatcher, {
      sourceQueue: SOURCE,
      pollTimeoutMs: 20,
      errorBackoffMs: 10,
    });
    app = createApp({
      dispatcher,
      registry,
      consumer,
      sourceQueue: SOURCE,
      defaultTargetQueue: TARGET,
    });
  });

  describe('POST /messages', () => {
    it('dispatches an up directive and enqueues the work-order', async () => {
      const res = await request(app).post('/messages').send({ up: 'org/app' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'success', message: 'Message processed successfully' });
      expect(store.items(TARGET)).toEqual([
        '{"repo":"org/app","branch":"refs/heads/main","type":"service-up","dir":"/srv/app","commands":["start.sh"]}',
      ]);
    });

    it.each(['application/x-www-form-urlencoded', 'text/plain'])(
      'decodes a JSON body sent as %s',
      async (contentType) => {
        const res = await request(app)
          .post('/messages')
          .set('Content-Type', contentType)
          .send('{"up":"org/app"}');

        expect(res.status).toBe(200);
        expect(store.itemsJson(TARGET)).toEqual([
          {
            repo: 'org/app',
            branch: 'refs/heads/main',
            type: 'service-up',
            dir: '/srv/app',
            commands: ['start.sh'],
          },
        ]);
      },
    );

    it('dispatches when the other action fields are null', async () => {
      const res = await request(app).post('/messages').send({ up: 'org/app', down: null });

      expect(res.status).toBe(200);
      expect(store.items(TARGET)).toHaveLength(1);
    });

    it('returns 400 for an empty body', async () => {
      const res = await request(app).post('/messages');

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Message must contain either 'up', 'down', or 'restart' field");
    });

    it('returns 500 for an unknown repository and writes nothing', async () => {
      const res = await request(app).post('/messages').send({ down: 'org/missing' });

      expect(res.status).toBe(500);
      expect(res.body).toEqual({
        error: 'no configuration found for repository: org/missing',
        code: 'UNKNOWN_REPOSITORY',
      });
      expect(store.items(TARGET)).toEqual([]);
    });

    it('returns 400 when no action field is present', async () => {
      const res = await request(app).post('/messages').send({});

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: "Message must contain either 'up', 'down', or 'restart' field",
        code: 'INVALID_DIRECTIVE',
      });
      expect(store.items(TARGET)).toEqual([]);
    });

    it('returns 400 when more than one action field is present', async () => {
      const res = await request(app).post('/messages').send({ up: 'org/app', down: 'org/app' });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('INVALID_DIRECTIVE');
      expect(store.items(TARGET)).toEqual([]);
    });

    it('returns 400 for malformed JSON', async () => {
      const res = await request(app)
        .post('/messages')
        .set('Content-Type', 'application/json')
        .send('{"up":');

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('INVALID_DIRECTIVE');
      expect(res.body.error).toMatch(/^Invalid JSON: /);
    });

    it('returns 400 for a non-string action field', async () => {
      const res = await request(app).post('/messages').send({ restart: true });

      expect(res.status).toBe(400);
      expect(res.body.error).toMatch(/^Invalid 'restart' field: /);
    });

    it('returns 500 with the cause when the append fails', async () => {
      vi.spyOn(store, 'pushTail').mockRejectedValueOnce(new Error('Connection is closed.'));

      const res = await request(app).post('/messages').send({ up: 'org/app' });

      expect(res.status).toBe(500);
      expect(res.body).toEqual({
        error: 'failed to push notification to poppit:notifications: Connection is closed.',
        code: 'DELIVERY_FAILED',
      });
    });

    it('emits restart with an empty command list when none are configured', async () => {
      const res = await request(app).post('/messages').send({ restart: 'org/app' });

      expect(res.status).toBe(200);
      expect(store.itemsJson(TARGET)).toEqual([
        {
          repo: 'org/app',
          branch: 'refs/heads/main',
          type: 'service-restart',
          dir: '/srv/app',
          commands: [],
        },
      ]);
    });
  });

  describe('other methods', () => {
    it.each(['get', 'put', 'delete', 'patch'] as const)('%s /messages returns 405', async (method) => {
      const res = await request(app)[method]('/messages');

      expect(res.status).toBe(405);
      expect(res.headers.allow).toBe('POST');
      expect(res.body).toEqual({ error: 'Method not allowed', code: 'METHOD_NOT_ALLOWED' });
    });
  });

  it('returns 404 for unknown paths', async () => {
    const res = await request(app).post('/commands').send({ up: 'org/app' });

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Not found', code: 'NOT_FOUND' });
  });

  it('handles the same directive arriving through both ingress paths', async () => {
    consumer.start();
    try {
      await store.pushTail(SOURCE, '{"up":"org/app"}');
      const res = await request(app).post('/messages').send({ up: 'org/app' });

      expect(res.status).toBe(200);
      await vi.waitFor(() => expect(store.items(TARGET)).toHaveLength(2));
      const expected = {
        repo: 'org/app',
        branch: 'refs/heads/main',
        type: 'service-up',
        dir: '/srv/app',
        commands: ['start.sh'],
      };
      expect(store.itemsJson(TARGET)).toEqual([expected, expected]);
    } finally {
      await consumer.stop();
    }
  });
});
