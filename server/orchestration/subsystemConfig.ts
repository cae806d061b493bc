import { parseAdvertiseAddress } from "@shared/schema";
import type { SubsystemConfig } from "../execution/types";

type ClusterIdentity = {
  id: string;
  name: string;
  advertiseAddress: string;
};

type NodeIdentity = {
  hostname: string;
  ip: string;
};

export function buildSubsystemConfig(
  cluster: ClusterIdentity,
  node: NodeIdentity,
  caCertPem: string,
  storageDevice: string,
): SubsystemConfig {
  const advertise = parseAdvertiseAddress(cluster.advertiseAddress);
  if (!advertise) {
    throw new Error(`Cluster "${cluster.name}" has an unusable advertise address "${cluster.advertiseAddress}"`);
  }
  return {
    clusterId: cluster.id,
    clusterName: cluster.name,
    advertiseHost: advertise.host,
    advertisePort: advertise.port,
    nodeHostname: node.hostname,
    nodeIp: node.ip,
    storageDevice,
    caCertPem,
  };
}
