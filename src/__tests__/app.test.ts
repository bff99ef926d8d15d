import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../app';
import { BookGenerator } from '../generator';
import { LLMProviderManager } from '../llm/provider';
import { createFakeFactories, sampleBookData } from './helpers';

describe('HTTP app', () => {
  let app: Express;

  beforeEach(() => {
    const generator = new BookGenerator({
      providers: new LLMProviderManager(createFakeFactories().factories),
      delay: async () => undefined,
    });
    app = createApp(generator);
  });

  it('serves the landing page', async () => {
    const res = await request(app).get('/');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/text\/html/);
    expect(res.text).toContain('<h1>Bookwright</h1>');
  });

  it('reports health', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('healthy');
    expect(res.body.providers).toEqual([]);
  });

  it('configures a provider and then generates an outline with it', async () => {
    const configured = await request(app).post('/configure-apis').send({ openai_key: 'k1' });
    expect(configured.body).toEqual({ success: true, message: 'APIs configured successfully' });

    const res = await request(app).post('/create-outline').send({ provider: 'openai', book_data: sampleBookData });

    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.outline).toBe('openai reply');
  });

  it('returns failures with a 200 status', async () => {
    const res = await request(app).post('/generate-chapter').send({ book_data: sampleBookData });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      success: false,
      message: 'Error generating chapter: Missing required field: provider',
    });
  });

  it('generates a full book', async () => {
    await request(app).post('/configure-apis').send({ gemini_key: 'k2' });

    const res = await request(app)
      .post('/generate-full-book')
      .send({ provider: 'gemini', book_data: { ...sampleBookData, num_chapters: 2 } });

    expect(res.body.success).toBe(true);
    expect(res.body.total_chapters).toBe(2);
    expect(res.body.chapters.map((c: { title: string }) => c.title)).toEqual(['Chapter 1', 'Chapter 2']);
  });

  it('reports malformed JSON in the payload', async () => {
    const res = await request(app)
      .post('/create-outline')
      .set('Content-Type', 'application/json')
      .send('{"provider": ');

    expect(res.status).toBe(200);
    expect(res.body.success).toBe(false);
    expect(res.body.message).toMatch(/^Error: /);
  });
});
