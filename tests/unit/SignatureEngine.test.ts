// tests/unit/SignatureEngine.test.ts

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import crypto from 'crypto';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  signRequest,
  percentEncode,
  normalizeParameters,
  buildBaseString,
  buildAuthorizationHeader,
  parseSignatureMethod,
} from '../../src/core/signature/SignatureEngine';
import { CryptoError, ValidationError } from '../../src/utils/errors';

const TOKEN_URL = 'https://api.example.com/token';

const baseParams = {
  oauth_consumer_key: 'ck',
  oauth_timestamp: '1',
  oauth_nonce: 'n',
  oauth_version: '1.0',
  oauth_signature_method: 'HMAC-SHA1',
};

const BASE_STRING =
  'POST&https%3A%2F%2Fapi.example.com%2Ftoken&oauth_consumer_key%3Dck%26oauth_nonce%3Dn' +
  '%26oauth_signature_method%3DHMAC-SHA1%26oauth_timestamp%3D1%26oauth_version%3D1.0';

describe('SignatureEngine', () => {
  describe('percentEncode', () => {
    it('should leave unreserved characters untouched', () => {
      expect(percentEncode('AZaz09-._~')).toBe('AZaz09-._~');
    });

    it('should encode space as %20, never +', () => {
      expect(percentEncode('a b+c')).toBe('a%20b%2Bc');
    });

    it('should encode the characters encodeURIComponent leaves alone', () => {
      expect(percentEncode("!'()*")).toBe('%21%27%28%29%2A');
    });

    it('should encode multi-byte characters as UTF-8', () => {
      expect(percentEncode('é')).toBe('%C3%A9');
    });
  });

  it('should raise ValidationError for a lone surrogate', () => {
    expect(() => percentEncode('\uDC00')).toThrow(ValidationError);
  });

  describe('normalizeParameters', () => {
    it('should sort keys and drop oauth_signature', () => {
      const normalized = normalizeParameters({
        b: '2',
        a: '1',
        oauth_signature: 'ignored',
      });

      expect(normalized).toBe('a=1&b=2');
    });

    it('should order by byte value, uppercase before lowercase', () => {
      expect(normalizeParameters({ b: '1', B: '2', a: '3' })).toBe('B=2&a=3&b=1');
    });
  });

  describe('buildBaseString', () => {
    it('should build the canonical base string', () => {
      expect(buildBaseString('POST', TOKEN_URL, baseParams)).toBe(BASE_STRING);
    });

    it('should uppercase the HTTP method', () => {
      expect(buildBaseString('post', TOKEN_URL, baseParams)).toBe(BASE_STRING);
    });

    it('should double-encode reserved characters in parameter values', () => {
      const baseString = buildBaseString('get', 'http://example.com/r v', {
        ...baseParams,
        status: 'hello world!~*',
      });

      expect(baseString.startsWith('GET&http%3A%2F%2Fexample.com%2Fr%20v&')).toBe(true);
      expect(baseString.endsWith('%26status%3Dhello%2520world%2521~%252A')).toBe(true);
    });
  });

  describe('signRequest (HMAC-SHA1)', () => {
    it('should produce the pinned signature for a known request', () => {
      expect(signRequest('POST', TOKEN_URL, baseParams, 'secret', '')).toBe(
        '2vDQh6eJSaiwEAd6lCqropP2pms='
      );
    });

    it('should default to HMAC-SHA1 with an empty token secret', () => {
      expect(signRequest('POST', TOKEN_URL, baseParams, 'secret')).toBe(
        '2vDQh6eJSaiwEAd6lCqropP2pms='
      );
    });

    it('should include the token secret in the signing key', () => {
      expect(signRequest('POST', TOKEN_URL, baseParams, 'secret', 'tokensecret')).toBe(
        'ZOuWPR7tHdEp0R8gxhRVd2/gKQE='
      );
    });

    it('should percent-encode secrets and parameters before signing', () => {
      const signature = signRequest(
        'get',
        'http://example.com/r v',
        {
          oauth_consumer_key: 'key',
          oauth_nonce: 'abc',
          oauth_signature_method: 'HMAC-SHA1',
          oauth_timestamp: '100',
          oauth_version: '1.0',
          oauth_token: 'tok',
          status: 'hello world!~*',
          'a b': "it's",
        },
        'c s',
        't&s'
      );

      expect(signature).toBe('qEtrWf5g2bqip8HvNVbRWF7hiN0=');
    });

    it('should not depend on parameter insertion order', () => {
      const reversed = Object.fromEntries(Object.entries(baseParams).reverse());

      expect(signRequest('POST', TOKEN_URL, reversed, 'secret')).toBe(
        signRequest('POST', TOKEN_URL, baseParams, 'secret')
      );
    });

    it('should ignore a previously computed oauth_signature', () => {
      const first = signRequest('POST', TOKEN_URL, baseParams, 'secret');
      const second = signRequest(
        'POST',
        TOKEN_URL,
        { ...baseParams, oauth_signature: first },
        'secret'
      );

      expect(second).toBe(first);
    });

    it('should return identical results on repeated calls', () => {
      const results = new Set(
        Array.from({ length: 5 }, () => signRequest('POST', TOKEN_URL, baseParams, 'secret'))
      );
      expect(results.size).toBe(1);
    });
  });

  describe('signRequest (PLAINTEXT)', () => {
    it('should return the base64-encoded base string', () => {
      const signature = signRequest('POST', TOKEN_URL, baseParams, 'secret', '', 'PLAINTEXT');

      expect(signature).toBe(Buffer.from(BASE_STRING, 'utf8').toString('base64'));
    });

    it('should not use the secrets', () => {
      expect(signRequest('POST', TOKEN_URL, baseParams, 'a', 'b', 'PLAINTEXT')).toBe(
        signRequest('POST', TOKEN_URL, baseParams, 'c', 'd', 'PLAINTEXT')
      );
    });
  });

  describe('validation', () => {
    it.each([
      'oauth_consumer_key',
      'oauth_timestamp',
      'oauth_nonce',
      'oauth_version',
      'oauth_signature_method',
    ])('should reject a request missing %s', (missing) => {
      const params: Record<string, string> = { ...baseParams };
      delete params[missing];

      expect(() => signRequest('POST', TOKEN_URL, params, 'secret')).toThrow(ValidationError);
      expect(() => signRequest('POST', TOKEN_URL, params, 'secret')).toThrow(
        `Parameter "${missing}" must be set.`
      );
    });

    it('should reject an unknown signature method, naming it', () => {
      expect(() => signRequest('POST', TOKEN_URL, baseParams, 'secret', '', 'HMAC-MD5')).toThrow(
        'Unknown signature method selected HMAC-MD5.'
      );
    });

    it('should report the unknown method in error details', () => {
      try {
        parseSignatureMethod('rsa-sha1');
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toMatchObject({
          code: 'VALIDATION_ERROR',
          details: { signatureMethod: 'rsa-sha1' },
        });
      }
    });

    it('should reject a parameter value that is not well-formed UTF-16', () => {
      const params = { ...baseParams, oauth_nonce: '\uD800' };

      expect(() => signRequest('POST', TOKEN_URL, params, 'secret')).toThrow(ValidationError);
      expect(() => signRequest('POST', TOKEN_URL, params, 'secret')).toThrow(
        'Parameter "oauth_nonce" cannot be percent-encoded.'
      );
    });

    it('should accept every supported method name', () => {
      expect(parseSignatureMethod('HMAC-SHA1')).toBe('HMAC-SHA1');
      expect(parseSignatureMethod('RSA-SHA1')).toBe('RSA-SHA1');
      expect(parseSignatureMethod('PLAINTEXT')).toBe('PLAINTEXT');
    });
  });

  describe('signRequest (RSA-SHA1)', () => {
    let tmpDir: string;
    let keyPath: string;
    let encryptedKeyPath: string;
    let publicKey: string;

    beforeAll(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'signature-engine-'));

      const pair = crypto.generateKeyPairSync('rsa', {
        modulusLength: 2048,
        publicKeyEncoding: { type: 'spki', format: 'pem' },
        privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
      });
      publicKey = pair.publicKey;
      keyPath = path.join(tmpDir, 'private.pem');
      fs.writeFileSync(keyPath, pair.privateKey);

      const encrypted = crypto.createPrivateKey(pair.privateKey).export({
        type: 'pkcs8',
        format: 'pem',
        cipher: 'aes-256-cbc',
        passphrase: 'test-passphrase',
      });
      encryptedKeyPath = path.join(tmpDir, 'encrypted.pem');
      fs.writeFileSync(encryptedKeyPath, encrypted);
    });

    afterAll(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should sign the base string with the private key', () => {
      const signature = signRequest('POST', TOKEN_URL, baseParams, keyPath, '', 'RSA-SHA1');

      const valid = crypto.verify(
        'sha1',
        Buffer.from(BASE_STRING, 'utf8'),
        publicKey,
        Buffer.from(signature, 'base64')
      );
      expect(valid).toBe(true);
    });

    it('should use the token secret as passphrase for an encrypted key', () => {
      const signature = signRequest(
        'POST',
        TOKEN_URL,
        baseParams,
        encryptedKeyPath,
        'test-passphrase',
        'RSA-SHA1'
      );

      const valid = crypto.verify(
        'sha1',
        Buffer.from(BASE_STRING, 'utf8'),
        publicKey,
        Buffer.from(signature, 'base64')
      );
      expect(valid).toBe(true);
    });

    it('should be deterministic for the same key and input', () => {
      expect(signRequest('POST', TOKEN_URL, baseParams, keyPath, '', 'RSA-SHA1')).toBe(
        signRequest('POST', TOKEN_URL, baseParams, keyPath, '', 'RSA-SHA1')
      );
    });

    it('should throw CryptoError for a missing key file', () => {
      const missing = path.join(tmpDir, 'missing.pem');

      expect(() => signRequest('POST', TOKEN_URL, baseParams, missing, '', 'RSA-SHA1')).toThrow(
        CryptoError
      );
    });

    it('should throw CryptoError for a wrong passphrase', () => {
      expect(() =>
        signRequest('POST', TOKEN_URL, baseParams, encryptedKeyPath, 'wrong', 'RSA-SHA1')
      ).toThrow('Failed to sign base string with RSA-SHA1');
    });

    it('should throw CryptoError for a file that is not a key', () => {
      const notAKey = path.join(tmpDir, 'not-a-key.pem');
      fs.writeFileSync(notAKey, 'plain text');

      expect(() => signRequest('POST', TOKEN_URL, baseParams, notAKey, '', 'RSA-SHA1')).toThrow(
        CryptoError
      );
    });
  });

  describe('buildAuthorizationHeader', () => {
    it('should include only sorted, encoded oauth_* parameters', () => {
      const header = buildAuthorizationHeader({
        oauth_nonce: 'n',
        status: 'ignored',
        oauth_callback: 'http://localhost/cb',
        oauth_signature: 'a+b=',
      });

      expect(header).toBe(
        'OAuth oauth_callback="http%3A%2F%2Flocalhost%2Fcb", oauth_nonce="n", oauth_signature="a%2Bb%3D"'
      );
    });

    it('should put the realm first', () => {
      expect(buildAuthorizationHeader({ oauth_nonce: 'n' }, 'Example')).toBe(
        'OAuth realm="Example", oauth_nonce="n"'
      );
    });
  });
});
