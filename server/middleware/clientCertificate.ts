import type { Request, Response, NextFunction } from "express";
import { TLSSocket } from "tls";

export type MemberIdentity = {
  commonName: string;
  fingerprint: string;
};

declare global {
  namespace Express {
    interface Request {
      memberIdentity: MemberIdentity;
    }
  }
}

/**
 * Admits only requests whose TLS client certificate chains to the cluster CA
 * the member server was started with.
 */
export function requireClientCertificate(req: Request, res: Response, next: NextFunction) {
  const socket = req.socket;
  if (!(socket instanceof TLSSocket) || !socket.authorized) {
    return res.status(401).json({ message: "A client certificate issued by the cluster CA is required" });
  }

  const peer = socket.getPeerCertificate();
  const commonName = typeof peer.subject?.CN === "string" ? peer.subject.CN : "";
  if (!commonName) {
    return res.status(401).json({ message: "Client certificate has no common name" });
  }

  req.memberIdentity = { commonName, fingerprint: peer.fingerprint256 };
  next();
}
