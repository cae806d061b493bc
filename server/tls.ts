import https from "https";
import type { Express } from "express";
import { parseAdvertiseAddress, type Cluster } from "@shared/schema";
import type { IClusterStore } from "./storage";
import type { CredentialAuthority } from "./services/credentialAuthority";

export type MemberServerOptions = {
  store: IClusterStore;
  authority: CredentialAuthority;
  hostname: string;
  host: string;
  port: number;
};

/**
 * HTTPS server for the member API. Its certificate is a fresh leaf for the
 * cluster's advertise host; clients must present a certificate from the
 * same CA. Unauthorized handshakes are let through to the middleware, which
 * answers them with 401.
 */
export async function startMemberServer(app: Express, cluster: Cluster, opts: MemberServerOptions): Promise<https.Server> {
  const ca = opts.store.reads.getCA(cluster.id);
  if (!ca) {
    throw new Error(`Cluster ${cluster.id} has no certificate authority`);
  }
  const advertise = parseAdvertiseAddress(cluster.advertiseAddress);
  const serverCert = await opts.authority.issueNodeCertificate(
    { certPem: ca.certPem, keyPem: ca.keyPem },
    advertise?.host ?? cluster.advertiseAddress,
    opts.hostname,
  );

  const server = https.createServer(
    {
      key: serverCert.keyPem,
      cert: serverCert.certPem,
      ca: ca.certPem,
      requestCert: true,
      rejectUnauthorized: false,
    },
    app,
  );

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(opts.port, opts.host, () => {
      server.off("error", reject);
      resolve();
    });
  });
  return server;
}
