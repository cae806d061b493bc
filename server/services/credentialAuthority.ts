import { randomBytes as cryptoRandomBytes, X509Certificate } from "crypto";
import { isIP } from "net";
import forge from "node-forge";
import { parseAdvertiseAddress } from "@shared/schema";
import { CryptoFailureError } from "../errors";

const CA_VALIDITY_YEARS = 10;
const LEAF_VALIDITY_DAYS = 365;
const TOKEN_PREFIX = "mcloud";
const TOKEN_RANDOM_BYTES = 12;

const CA_SUBJECT: forge.pki.CertificateField[] = [
  { name: "organizationName", value: "MCloud" },
  { name: "commonName", value: "MCloud Cluster CA" },
];

export type PemPair = {
  certPem: string;
  keyPem: string;
};

export type IssuedCertificate = PemPair & {
  serial: string;
  notBefore: Date;
  notAfter: Date;
};

export type CredentialAuthorityOptions = {
  caKeyBits?: number;
  leafKeyBits?: number;
  /** CSPRNG used for serials and token suffixes. */
  randomBytes?: (size: number) => Buffer;
  now?: () => Date;
};

function generateKeyPair(bits: number): Promise<forge.pki.rsa.KeyPair> {
  return new Promise((resolve, reject) => {
    forge.pki.rsa.generateKeyPair({ bits, e: 0x10001 }, (err, keypair) => {
      if (err) reject(err);
      else resolve(keypair);
    });
  });
}

type SubjectAltName = { type: 7; ip: string } | { type: 2; value: string };

function altNameFor(host: string): SubjectAltName {
  return isIP(host) !== 0 ? { type: 7, ip: host } : { type: 2, value: host };
}

// "10.0.0.5:8443" and "[fd00::5]:8443" are reduced to the bare host.
function subjectHost(subjectAddress: string): string {
  const parsed = parseAdvertiseAddress(subjectAddress);
  if (parsed) return parsed.host;
  return subjectAddress.trim();
}

export class CredentialAuthority {
  private readonly caKeyBits: number;
  private readonly leafKeyBits: number;
  private readonly randomBytes: (size: number) => Buffer;
  private readonly now: () => Date;

  constructor(opts: CredentialAuthorityOptions = {}) {
    this.caKeyBits = opts.caKeyBits ?? 4096;
    this.leafKeyBits = opts.leafKeyBits ?? 2048;
    this.randomBytes = opts.randomBytes ?? cryptoRandomBytes;
    this.now = opts.now ?? (() => new Date());
  }

  private serialNumber(): string {
    const bytes = this.randomBytes(20);
    // Positive, non-zero leading byte keeps the DER integer at 20 bytes.
    bytes[0] = (bytes[0] & 0x7f) | 0x01;
    return bytes.toString("hex");
  }

  async createCA(): Promise<PemPair> {
    try {
      const keys = await generateKeyPair(this.caKeyBits);
      const cert = forge.pki.createCertificate();
      const notBefore = this.now();
      const notAfter = new Date(notBefore);
      notAfter.setUTCFullYear(notAfter.getUTCFullYear() + CA_VALIDITY_YEARS);

      cert.publicKey = keys.publicKey;
      cert.serialNumber = this.serialNumber();
      cert.validity.notBefore = notBefore;
      cert.validity.notAfter = notAfter;
      cert.setSubject(CA_SUBJECT);
      cert.setIssuer(CA_SUBJECT);
      cert.setExtensions([
        { name: "basicConstraints", cA: true, critical: true },
        { name: "keyUsage", keyCertSign: true, cRLSign: true, digitalSignature: true, critical: true },
        { name: "subjectKeyIdentifier" },
      ]);
      cert.sign(keys.privateKey, forge.md.sha256.create());

      return {
        certPem: forge.pki.certificateToPem(cert),
        keyPem: forge.pki.privateKeyToPem(keys.privateKey),
      };
    } catch (err) {
      throw new CryptoFailureError("create CA", err);
    }
  }

  /**
   * Issues a leaf for `subjectAddress`, signed by `ca`. The leaf carries both
   * serverAuth and clientAuth so one certificate serves either side of the
   * member channel. `hostname`, when given, becomes the CN and an extra DNS SAN.
   */
  async issueNodeCertificate(ca: PemPair, subjectAddress: string, hostname?: string): Promise<IssuedCertificate> {
    try {
      const caCert = forge.pki.certificateFromPem(ca.certPem);
      const caKey = forge.pki.privateKeyFromPem(ca.keyPem);
      const keys = await generateKeyPair(this.leafKeyBits);
      const host = subjectHost(subjectAddress);

      const notBefore = this.now();
      let notAfter = new Date(notBefore.getTime() + LEAF_VALIDITY_DAYS * 24 * 60 * 60 * 1000);
      if (notAfter.getTime() > caCert.validity.notAfter.getTime()) {
        notAfter = new Date(caCert.validity.notAfter.getTime());
      }

      const altNames: SubjectAltName[] = [altNameFor(host)];
      if (hostname && hostname !== host) altNames.push(altNameFor(hostname));

      const cert = forge.pki.createCertificate();
      cert.publicKey = keys.publicKey;
      cert.serialNumber = this.serialNumber();
      cert.validity.notBefore = notBefore;
      cert.validity.notAfter = notAfter;
      cert.setSubject([
        { name: "organizationName", value: "MCloud" },
        { name: "commonName", value: hostname ?? host },
      ]);
      cert.setIssuer(caCert.subject.attributes);
      cert.setExtensions([
        { name: "basicConstraints", cA: false },
        { name: "keyUsage", digitalSignature: true, keyEncipherment: true, critical: true },
        { name: "extKeyUsage", serverAuth: true, clientAuth: true },
        { name: "subjectAltName", altNames },
        { name: "subjectKeyIdentifier" },
      ]);
      cert.sign(caKey, forge.md.sha256.create());

      return {
        certPem: forge.pki.certificateToPem(cert),
        keyPem: forge.pki.privateKeyToPem(keys.privateKey),
        serial: cert.serialNumber,
        notBefore,
        notAfter,
      };
    } catch (err) {
      throw new CryptoFailureError("issue node certificate", err);
    }
  }

  /** `mcloud-<first 8 chars of the cluster id>-<16 url-safe random chars>` */
  generateBootstrapToken(clusterId: string): string {
    const prefix = clusterId.slice(0, 8);
    if (prefix.length < 8) {
      throw new CryptoFailureError("generate bootstrap token", new Error(`cluster id "${clusterId}" is too short`));
    }
    let suffix: string;
    try {
      suffix = this.randomBytes(TOKEN_RANDOM_BYTES).toString("base64url");
    } catch (err) {
      throw new CryptoFailureError("generate bootstrap token", err);
    }
    return `${TOKEN_PREFIX}-${prefix}-${suffix}`;
  }
}

export function verifyNodeCertificate(caCertPem: string, certPem: string): boolean {
  try {
    const ca = new X509Certificate(caCertPem);
    const leaf = new X509Certificate(certPem);
    return leaf.checkIssued(ca) && leaf.verify(ca.publicKey);
  } catch {
    return false;
  }
}

/** Loggable form of a token: the non-secret prefix only. */
export function describeToken(token: string): string {
  const match = /^mcloud-([^-]+)-/.exec(token);
  return match ? `${TOKEN_PREFIX}-${match[1]}-****` : "****";
}
