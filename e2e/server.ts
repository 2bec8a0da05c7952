import { type ServerType, serve } from '@hono/node-server';
import { Hono } from 'hono';
import { z } from 'zod';
import { validator } from '../src/utils/validator.js';
import { type SafeWrapAsync, safeWrapAsync } from '../src/utils/wrap.js';

/** Token the server accepts. */
export const E2E_TOKEN = 'test-token';

/** Cloud id answered with a 500 and a diagnostic body. */
export const FAILING_CLOUD_ID = 'failing-cloud';

/** Cloud id answered with a 200 and no body. */
export const SILENT_CLOUD_ID = 'silent-cloud';

export const buildsRequestSchema = z.object({
  builds: z.array(
    z.object({
      pipelineId: z.string(),
      buildNumber: z.number().int(),
      displayName: z.string(),
      state: z.enum(['pending', 'in_progress', 'successful', 'failed', 'cancelled', 'unknown']),
    }),
  ),
});

export const buildsResponseSchema = z.object({
  acceptedBuilds: z.array(z.object({ pipelineId: z.string(), buildNumber: z.number().int() })),
  rejectedBuilds: z.array(z.object({ key: z.object({ pipelineId: z.string() }), errors: z.array(z.string()) })),
});

/** A request the server received. */
export type ReceivedRequest = {
  cloudId: string;
  contentType: string | undefined;
  body: unknown;
};

export type E2EServer = {
  url: string;
  received: () => ReceivedRequest[];
  close: () => Promise<Error | null>;
};

/**
 * Starts an in-process stand-in for the Jira builds API on a random local port.
 */
export async function startE2EServer(): SafeWrapAsync<Error, E2EServer> {
  const received: ReceivedRequest[] = [];
  const app = new Hono();

  app.post('/jira/builds/0.1/cloud/:cloudId/bulk', async (c) => {
    if (c.req.header('authorization') !== `Bearer ${E2E_TOKEN}`) {
      return c.json({ error: 'unauthorized' }, 401);
    }

    const cloudId = c.req.param('cloudId');
    const [errParse, parsed] = await safeWrapAsync(() => c.req.json());
    if (errParse) {
      return c.json({ error: 'invalid json', details: errParse.message }, 400);
    }

    received.push({ cloudId, contentType: c.req.header('content-type'), body: parsed });

    if (cloudId === FAILING_CLOUD_ID) {
      return c.json({ err: 'boom' }, 500);
    }

    if (cloudId === SILENT_CLOUD_ID) {
      return new Response(null, { status: 200 });
    }

    const [errValidate, request] = await validator(parsed, buildsRequestSchema);
    if (errValidate) {
      return c.json({ error: 'invalid request body', details: errValidate.message }, 400);
    }

    return c.json({
      acceptedBuilds: request.builds.map(({ pipelineId, buildNumber }) => ({ pipelineId, buildNumber })),
      rejectedBuilds: [],
    });
  });

  const [errServer, serverAndPort] = await safeWrapAsync(
    () =>
      new Promise<[ServerType, number]>((resolve) => {
        const srv = serve({ fetch: app.fetch, port: 0, hostname: '127.0.0.1' }, (serverInfo) => {
          resolve([srv, serverInfo.port]);
        });
      }),
  );

  if (errServer) {
    return [new Error('error starting server', { cause: errServer }), null];
  }

  const [server, port] = serverAndPort;

  return [
    null,
    {
      url: `http://127.0.0.1:${port}`,
      received: () => structuredClone(received),
      close: () =>
        new Promise<Error | null>((resolve) =>
          server.close((err) => {
            if (err) {
              resolve(new Error('error closing server', { cause: err }));
              return;
            }

            resolve(null);
          }),
        ),
    },
  ];
}
