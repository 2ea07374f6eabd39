import { describe, it, expect } from '@jest/globals';
import { matchesTrigger, parsePushWebhook, verifyWebhookSignature } from '../pipeline/trigger.js';
import { parsePipelineDefinition } from '../pipeline/loader.js';
import { hmacSha256Hex } from '../shared/redact.js';

const definition = parsePipelineDefinition(`
name: build
on: { push: { branch: live } }
jobs:
  test: { steps: [{ kind: checkout-source }] }
`);

describe('matchesTrigger', () => {
  it('matches only a push to the configured branch', () => {
    expect(matchesTrigger(definition, { branch: 'live', sha: 'abc1234' })).toBe(true);
    expect(matchesTrigger(definition, { branch: 'main', sha: 'abc1234' })).toBe(false);
    expect(matchesTrigger(definition, { branch: 'live-2', sha: 'abc1234' })).toBe(false);
  });
});

describe('parsePushWebhook', () => {
  const sha = '9f2c1e0b7d4a3c5e6f708192a3b4c5d6e7f80912';

  it('reads branch, commit, clone url and pusher', () => {
    const event = parsePushWebhook({
      ref: 'refs/heads/live',
      after: sha,
      repository: { clone_url: 'https://git.example.test/team/chat-bot.git', full_name: 'team/chat-bot' },
      pusher: { name: 'dev-user' },
    });
    expect(event).toEqual({
      branch: 'live',
      sha,
      repository: 'https://git.example.test/team/chat-bot.git',
      pusher: 'dev-user',
    });
  });

  it('keeps slashes in branch names', () => {
    expect(parsePushWebhook({ ref: 'refs/heads/release/1.2', after: sha })?.branch).toBe('release/1.2');
  });

  it('ignores tag pushes and branch deletions', () => {
    expect(parsePushWebhook({ ref: 'refs/tags/v1.0.0', after: sha })).toBeNull();
    expect(parsePushWebhook({ ref: 'refs/heads/live', after: sha, deleted: true })).toBeNull();
  });

  it('refuses a clone url that is not a URL', () => {
    expect(
      parsePushWebhook({
        ref: 'refs/heads/live',
        after: sha,
        repository: { clone_url: '--upload-pack=touch /tmp/owned;' },
      }),
    ).toBeNull();
  });

  it('ignores payloads that are not pushes', () => {
    expect(parsePushWebhook({ zen: 'Keep it logically awesome.' })).toBeNull();
    expect(parsePushWebhook({ ref: 'refs/heads/live', after: 'not-a-sha' })).toBeNull();
    expect(parsePushWebhook(null)).toBeNull();
  });
});

describe('verifyWebhookSignature', () => {
  const body = '{"ref":"refs/heads/live"}';
  const secret = 'test-secret';

  it('accepts the HMAC of the exact body', () => {
    expect(verifyWebhookSignature(body, `sha256=${hmacSha256Hex(body, secret)}`, secret)).toBe(true);
  });

  it('rejects a signature made with another secret or over another body', () => {
    expect(verifyWebhookSignature(body, `sha256=${hmacSha256Hex(body, 'other-secret')}`, secret)).toBe(false);
    expect(verifyWebhookSignature(body, `sha256=${hmacSha256Hex(`${body} `, secret)}`, secret)).toBe(false);
  });

  it('rejects missing, malformed and non-sha256 signatures', () => {
    expect(verifyWebhookSignature(body, undefined, secret)).toBe(false);
    expect(verifyWebhookSignature(body, 'sha256=abc', secret)).toBe(false);
    expect(verifyWebhookSignature(body, `sha1=${hmacSha256Hex(body, secret)}`, secret)).toBe(false);
  });
});
