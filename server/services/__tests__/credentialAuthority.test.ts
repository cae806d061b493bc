import { describe, it, expect, beforeAll } from "vitest";
import { X509Certificate } from "crypto";
import {
  CredentialAuthority,
  describeToken,
  verifyNodeCertificate,
  type PemPair,
} from "../credentialAuthority";
import { CryptoFailureError } from "../../errors";
import { createTestAuthority } from "../../__tests__/fixtures";

const CLUSTER_ID = "3f2a9c1e-7b4d-4e8a-9c0f-1a2b3c4d5e6f";

describe("CredentialAuthority: certificates", () => {
  const authority = createTestAuthority();
  let ca: PemPair;
  let otherCa: PemPair;

  beforeAll(async () => {
    ca = await authority.createCA();
    otherCa = await authority.createCA();
  });

  it("creates a self-signed CA valid for years", () => {
    const cert = new X509Certificate(ca.certPem);
    expect(cert.ca).toBe(true);
    expect(cert.subject).toContain("CN=MCloud Cluster CA");
    expect(cert.checkIssued(cert)).toBe(true);

    const lifetimeDays = (Date.parse(cert.validTo) - Date.parse(cert.validFrom)) / (24 * 60 * 60 * 1000);
    expect(lifetimeDays).toBeGreaterThan(9 * 365);
    expect(ca.keyPem).toContain("BEGIN RSA PRIVATE KEY");
  });

  it("issues a leaf that verifies against its own CA and not another", async () => {
    const leaf = await authority.issueNodeCertificate(ca, "10.0.0.21:8443", "node-a");

    expect(verifyNodeCertificate(ca.certPem, leaf.certPem)).toBe(true);
    expect(verifyNodeCertificate(otherCa.certPem, leaf.certPem)).toBe(false);
  });

  it("binds the leaf to the subject address and keeps it short-lived", async () => {
    const leaf = await authority.issueNodeCertificate(ca, "10.0.0.21:8443", "node-a");
    const cert = new X509Certificate(leaf.certPem);

    expect(cert.ca).toBe(false);
    expect(cert.subject).toContain("CN=node-a");
    expect(cert.subjectAltName).toContain("IP Address:10.0.0.21");
    expect(cert.subjectAltName).toContain("DNS:node-a");
    expect(leaf.notAfter.getTime() - leaf.notBefore.getTime()).toBeLessThanOrEqual(365 * 24 * 60 * 60 * 1000);
    expect(cert.serialNumber.toLowerCase()).toBe(leaf.serial.toLowerCase());
  });

  it("rejects garbage input without throwing", () => {
    expect(verifyNodeCertificate(ca.certPem, "not a certificate")).toBe(false);
  });

  it("wraps a malformed CA in CryptoFailure", async () => {
    await expect(
      authority.issueNodeCertificate({ certPem: "test-ca-cert", keyPem: "test-ca-key" }, "10.0.0.21"),
    ).rejects.toBeInstanceOf(CryptoFailureError);
  });
});

describe("CredentialAuthority: bootstrap tokens", () => {
  it("embeds the cluster id prefix and a 16-character url-safe suffix", () => {
    const token = createTestAuthority().generateBootstrapToken(CLUSTER_ID);
    expect(token).toMatch(/^mcloud-3f2a9c1e-[A-Za-z0-9_-]{16}$/);
  });

  it("produces a different suffix on every call", () => {
    const authority = createTestAuthority();
    const tokens = new Set(Array.from({ length: 20 }, () => authority.generateBootstrapToken(CLUSTER_ID)));
    expect(tokens.size).toBe(20);
  });

  it("uses the injected random source for the suffix", () => {
    const authority = new CredentialAuthority({ randomBytes: (size) => Buffer.alloc(size, 0xff) });
    expect(authority.generateBootstrapToken(CLUSTER_ID)).toBe("mcloud-3f2a9c1e-________________");
  });

  it("fails with CryptoFailure when the random source fails", () => {
    const authority = new CredentialAuthority({
      randomBytes: () => {
        throw new Error("entropy source exhausted");
      },
    });
    expect(() => authority.generateBootstrapToken(CLUSTER_ID)).toThrow(CryptoFailureError);
    expect(() => authority.generateBootstrapToken(CLUSTER_ID)).toThrow(/entropy source exhausted/);
  });

  it("describes a token by its prefix only", () => {
    expect(describeToken("mcloud-3f2a9c1e-AbCdEfGhIjKlMnOp")).toBe("mcloud-3f2a9c1e-****");
    expect(describeToken("something-else")).toBe("****");
  });
});
