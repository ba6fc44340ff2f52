import type { Server } from 'node:http';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { createApp } from '../../server/app.js';
import { resolveServerConfig } from '../../server/config.js';

// Two devices, one preamble and a window of one: both transmit in slot 1 and collide.
const collidingRun = { numDevices: 2, numSlots: 1, minCW: 1, maxCW: 1, numPreambles: 1 };

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  const app = createApp(resolveServerConfig({ SIM_MAX_WORK: '1000' }));
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('Expected a TCP address');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  vi.restoreAllMocks();
});

function runIdOf(payload: unknown): string {
  if (typeof payload === 'object' && payload !== null && 'runId' in payload && typeof payload.runId === 'string') {
    return payload.runId;
  }
  throw new Error('Response carries no runId');
}

function postRun(body: string): Promise<Response> {
  return fetch(`${baseUrl}/runs`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body
  });
}

describe('POST /runs', () => {
  it('runs every algorithm and reports an undefined delay as null', async () => {
    const res = await postRun(JSON.stringify(collidingRun));

    expect(res.status).toBe(201);
    const payload = await res.json();
    expect(payload).toMatchObject({
      config: { ...collidingRun, algorithms: ['BEB', 'LILD', 'Adaptive'], seed: 1 },
      results: ['BEB', 'LILD', 'Adaptive'].map((algorithm) => ({
        algorithm,
        metrics: { throughput: 0, fairnessIndex: 0, avgAccessDelay: null, collisionProbability: 1 },
        successes: 0,
        collisions: 1
      }))
    });
  });

  it('returns the validation issues for a rule violation', async () => {
    const res = await postRun(JSON.stringify({ ...collidingRun, minCW: 2 }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid simulation config: maxCW must be >= minCW',
      issues: ['maxCW must be >= minCW']
    });
  });

  it('rejects a request above the work ceiling', async () => {
    const res = await postRun(JSON.stringify({ ...collidingRun, numDevices: 200, numSlots: 2 }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Requested work 1200 (numDevices x numSlots x algorithms) exceeds the limit of 1000'
    });
  });

  it('answers malformed JSON with a 400', async () => {
    const res = await postRun('{"numDevices": ');

    expect(res.status).toBe(400);
  });
});

describe('GET /runs/:runId', () => {
  it('returns a stored run, its listing and its text report', async () => {
    const created = await postRun(JSON.stringify(collidingRun));
    const runId = runIdOf(await created.json());

    const list = await fetch(`${baseUrl}/runs`);
    expect(list.status).toBe(200);
    expect(await list.json()).toMatchObject({
      runs: expect.arrayContaining([expect.objectContaining({ runId, algorithms: ['BEB', 'LILD', 'Adaptive'] })])
    });

    const run = await fetch(`${baseUrl}/runs/${runId}`);
    expect(run.status).toBe(200);
    expect(await run.json()).toMatchObject({ runId });

    const report = await fetch(`${baseUrl}/runs/${runId}/report`);
    expect(report.status).toBe(200);
    expect(report.headers.get('content-type')).toBe('text/plain; charset=utf-8');
    expect(await report.text()).toContain('Average Access Delay:\n  BEB=NaN  LILD=NaN  Adaptive=NaN\n');
  });

  it('returns 404 for an unknown run', async () => {
    const res = await fetch(`${baseUrl}/runs/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Run not found: nope' });
  });
});

describe('other routes', () => {
  it('returns 404 for an unknown route', async () => {
    const res = await fetch(`${baseUrl}/unknown`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Route not found: GET /unknown' });
  });

  it('hides the scrape endpoint while scrape mode is off', async () => {
    const res = await fetch(`${baseUrl}/metrics/prometheus`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Prometheus scrape mode is disabled' });
  });

  it('reports health with pushgateway disabled', async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'ok',
      pushgateway: 'disabled',
      prometheus: { enabled: false, mode: 'pushgateway' }
    });
  });
});
