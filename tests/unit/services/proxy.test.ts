import { describe, expect, it } from 'vitest';

import {
  AppError,
  MalformedUpstreamError,
  PolicyViolationError,
  type PolicyViolation,
  SignatureError,
  TrieInvariantError,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
} from '../../../src/errors/app-error.js';
import { describeFailure } from '../../../src/services/proxy.js';

const TARGET = 'https://images.example.com/a.png';

function violation(reason: PolicyViolation): PolicyViolationError {
  return new PolicyViolationError(reason, 'refused', TARGET);
}

describe('describeFailure', () => {
  it('maps signature failures to 400', () => {
    expect(describeFailure('decoding', new SignatureError('mismatch'))).toEqual(
      { status: 400, body: 'Bad Signature' }
    );
  });

  it.each<[PolicyViolation, string]>([
    ['invalid-url', 'Invalid URL'],
    ['blocked-host', 'Bad url host'],
    ['credentials', 'Credential URLs not allowed'],
    ['denied-host', 'Denylist host failure'],
    ['not-allowed-host', 'Allowlist host failure'],
  ])('names the %s check while validating', (reason, body) => {
    expect(describeFailure('validating', violation(reason))).toEqual({
      status: 404,
      body,
    });
  });

  it.each<PolicyViolation>(['blocked-host', 'redirects', 'size', 'invalid-url'])(
    'hides the %s check once fetching',
    (reason) => {
      expect(describeFailure('fetching', violation(reason))).toEqual({
        status: 404,
        body: 'Error Fetching Resource',
      });
    }
  );

  it('maps a fired deadline to 504 in any later stage', () => {
    const timeout = new UpstreamTimeoutError(4000, TARGET);

    expect(describeFailure('fetching', timeout)).toEqual({
      status: 504,
      body: 'Gateway Timeout',
    });
    expect(describeFailure('streaming', timeout).status).toBe(504);
  });

  it('separates malformed from unsupported content types', () => {
    expect(
      describeFailure('fetching', new MalformedUpstreamError(TARGET, 'what'))
    ).toEqual({ status: 400, body: 'Malformed Content-Type' });
    expect(describeFailure('fetching', violation('content-type'))).toEqual({
      status: 404,
      body: 'Unsupported content-type returned',
    });
  });

  it('maps upstream failures to 404', () => {
    expect(
      describeFailure(
        'fetching',
        new UpstreamUnavailableError('Network error', TARGET)
      )
    ).toEqual({ status: 404, body: 'Error Fetching Resource' });
  });

  it('maps programming errors to 500', () => {
    expect(
      describeFailure('validating', new TrieInvariantError('broken'))
    ).toEqual({ status: 500, body: 'Internal Server Error' });
    expect(
      describeFailure('fetching', new AppError('odd', 500, 'ODD', false))
        .status
    ).toBe(500);
  });
});
