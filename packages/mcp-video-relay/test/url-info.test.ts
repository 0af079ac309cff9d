import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { classifyUrls, findUrls, isAllowlisted, registrableDomain } from '../src/utils/url-info.ts';

const ALLOWLIST = ['youtube.com', 'tiktok.com'];

describe('findUrls', () => {
  it('finds http and https URLs in order and drops trailing punctuation', () => {
    assert.deepEqual(findUrls('see https://www.youtube.com/watch?v=abc, and (http://vm.tiktok.com/xyz).'), [
      'https://www.youtube.com/watch?v=abc',
      'http://vm.tiktok.com/xyz',
    ]);
  });

  it('ignores other schemes and plain text', () => {
    assert.deepEqual(findUrls('ftp://files.example.com and www.youtube.com'), []);
  });
});

describe('registrableDomain', () => {
  it('keeps the last two labels', () => {
    assert.equal(registrableDomain('www.YouTube.com'), 'youtube.com');
    assert.equal(registrableDomain('vm.tiktok.com.'), 'tiktok.com');
    assert.equal(registrableDomain('youtube.com'), 'youtube.com');
  });
});

describe('isAllowlisted', () => {
  it('matches subdomains of allowlisted sites only', () => {
    assert.equal(isAllowlisted('https://m.youtube.com/watch?v=1', ALLOWLIST), true);
    assert.equal(isAllowlisted('https://youtube.com.evil.net/v', ALLOWLIST), false);
    assert.equal(isAllowlisted('not a url', ALLOWLIST), false);
  });
});

describe('classifyUrls', () => {
  it('distinguishes none, multiple and a single URL', () => {
    assert.deepEqual(classifyUrls('hello there', ALLOWLIST), { kind: 'none' });
    assert.deepEqual(classifyUrls('https://youtube.com/a https://youtube.com/b', ALLOWLIST), { kind: 'multiple' });
    assert.deepEqual(classifyUrls('https://youtube.com/a https://example.org/b', ALLOWLIST), { kind: 'multiple' });
    assert.deepEqual(classifyUrls('watch https://youtu.be/abc', ALLOWLIST), {
      kind: 'one',
      url: 'https://youtu.be/abc',
      supported: false,
    });
    assert.deepEqual(classifyUrls('watch https://www.youtube.com/abc', ALLOWLIST), {
      kind: 'one',
      url: 'https://www.youtube.com/abc',
      supported: true,
    });
  });
});
