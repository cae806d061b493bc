import fs from "fs/promises";
import net from "net";
import path from "path";

/** Read-only checks against the local host, used by preflight. */
export interface HostProbe {
  commandExists(command: string): Promise<boolean>;
  portAvailable(port: number): Promise<boolean>;
  pathExists(target: string): Promise<boolean>;
}

export class LocalHostProbe implements HostProbe {
  async commandExists(command: string): Promise<boolean> {
    const dirs = (process.env.PATH ?? "").split(path.delimiter).filter(Boolean);
    for (const dir of dirs) {
      try {
        await fs.access(path.join(dir, command), fs.constants.X_OK);
        return true;
      } catch {
        continue;
      }
    }
    return false;
  }

  portAvailable(port: number): Promise<boolean> {
    return new Promise((resolve) => {
      const server = net.createServer();
      server.once("error", () => resolve(false));
      server.once("listening", () => {
        server.close(() => resolve(true));
      });
      server.listen(port);
    });
  }

  async pathExists(target: string): Promise<boolean> {
    try {
      await fs.access(target);
      return true;
    } catch {
      return false;
    }
  }
}
