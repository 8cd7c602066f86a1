// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/adapters/github/assertion-minter`
 * Purpose: GitHub App JWT minting. Implements AssertionMinter with jose over a node:crypto KeyObject.
 * Scope: Signs the claim set from @usage-metrics/core. Does not talk to the network.
 * Invariants:
 * - Claims are exactly iat/exp/iss from buildAssertionClaims (600s window, 60s backdate).
 * - Algorithm follows the key type: RSA → RS256, EC → ES256/384/512, Ed25519 → EdDSA.
 * - Key material never appears in errors or logs.
 * Side-effects: none (pure function of identity + clock)
 * Links: packages/metrics-core/src/assertion.ts
 * @internal
 */

import { createPrivateKey, type KeyObject } from "node:crypto";

import {
  type AssertionMinter,
  buildAssertionClaims,
  type Clock,
  CredentialError,
  epochSeconds,
  type Identity,
  type SignedAssertion,
} from "@usage-metrics/core";
import { SignJWT } from "jose";

const EC_CURVE_ALGORITHMS: Readonly<Record<string, string>> = {
  prime256v1: "ES256",
  secp384r1: "ES384",
  secp521r1: "ES512",
};

function parsePrivateKey(pem: string): KeyObject {
  try {
    return createPrivateKey({ key: pem, format: "pem" });
  } catch (error) {
    throw new CredentialError("private key is not a valid PEM private key", {
      cause: error,
    });
  }
}

/** JWS algorithm compatible with the key, or CredentialError. */
export function signingAlgorithmFor(key: KeyObject): string {
  switch (key.asymmetricKeyType) {
    case "rsa":
      return "RS256";
    case "ec": {
      const curve = key.asymmetricKeyDetails?.namedCurve ?? "unknown";
      const alg = EC_CURVE_ALGORITHMS[curve];
      if (!alg) {
        throw new CredentialError(`unsupported EC curve "${curve}"`);
      }
      return alg;
    }
    case "ed25519":
      return "EdDSA";
    default:
      throw new CredentialError(
        `unsupported key type "${key.asymmetricKeyType ?? "unknown"}"`
      );
  }
}

export class JoseAssertionMinter implements AssertionMinter {
  constructor(private readonly clock: Clock) {}

  async mint(identity: Identity): Promise<SignedAssertion> {
    const key = parsePrivateKey(identity.privateKey);
    const alg = signingAlgorithmFor(key);
    const claims = buildAssertionClaims(identity.appId, epochSeconds(this.clock));

    let token: string;
    try {
      token = await new SignJWT({})
        .setProtectedHeader({ alg, typ: "JWT" })
        .setIssuedAt(claims.iat)
        .setExpirationTime(claims.exp)
        .setIssuer(claims.iss)
        .sign(key);
    } catch (error) {
      throw new CredentialError(`signing with ${alg} failed`, {
        cause: error,
      });
    }

    return {
      token,
      issuedAt: claims.iat,
      expiresAt: claims.exp,
      issuer: claims.iss,
    };
  }
}
