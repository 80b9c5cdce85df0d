/**
 * Shared fixtures for tests
 */

import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { EnvironmentConfig, loadEnvironmentConfig } from '../config/environment';
import type { NewsItem } from '../types/news';

// Utility function to create mock responses
export const createMockResponse = (body: string, status = 200): Response =>
  new Response(body, { status, statusText: status === 200 ? 'OK' : 'Error' });

/**
 * Serve fixed bodies by URL through the global fetch mock. Numbers are
 * answered as an empty response with that status; unknown URLs get a 404.
 */
export function mockFetchRoutes(routes: Record<string, string | number>): jest.MockedFunction<typeof fetch> {
  const fetchMock = jest.mocked(fetch);
  fetchMock.mockReset();
  fetchMock.mockImplementation(async input => {
    const route = routes[String(input)];
    if (route === undefined) return createMockResponse('', 404);
    return typeof route === 'number' ? createMockResponse('', route) : createMockResponse(route);
  });
  return fetchMock;
}

export function makeItem(overrides: Partial<NewsItem> & Pick<NewsItem, 'item_id'>): NewsItem {
  return {
    source: 'Test Source',
    title: `Title ${overrides.item_id}`,
    summary: '',
    link: `https://news.example/${overrides.item_id}`,
    guid: `https://news.example/${overrides.item_id}`,
    image: null,
    published_at: '2026-10-19T01:00:00+00:00',
    ...overrides
  };
}

export function testConfig(env: Record<string, string> = {}): EnvironmentConfig {
  return loadEnvironmentConfig({ FETCH_RETRIES: '0', ...env });
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'newsdesk-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
