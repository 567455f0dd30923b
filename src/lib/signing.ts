import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { SigningOptions } from "../types";
import type { SigningCertificate } from "./dotnet";
import { errorMessage } from "./errors";

export interface SigningPlan {
  certificate?: SigningCertificate;
  /** Why signing is skipped on this host */
  warning?: string;
  /** The certificate could not be prepared */
  error?: string;
  /** Removes any temporary certificate file */
  dispose(): void;
}

const noop = () => {};

/**
 * Pick how packages get signed on this platform. Windows uses the
 * certificate store; elsewhere a PFX file is required, and Base64 PFX
 * content is written to a temporary file first.
 */
export function prepareSigning(
  options: SigningOptions | undefined,
  platform: NodeJS.Platform = process.platform,
  tempRoot: string = os.tmpdir(),
): SigningPlan {
  if (!options) return { dispose: noop };

  const thumbprint = options.certificateThumbprint?.replace(/\s+/g, "");
  const pfxPath = options.pfxPath?.trim();
  const pfxBase64 = options.pfxBase64?.trim();

  if (platform === "win32" && thumbprint) {
    return {
      certificate: {
        kind: "store",
        fingerprint: thumbprint,
        storeLocation: options.certificateStore ?? "CurrentUser",
      },
      dispose: noop,
    };
  }

  if (pfxPath) {
    return {
      certificate: { kind: "file", path: path.resolve(pfxPath), password: options.pfxPassword },
      dispose: noop,
    };
  }

  if (pfxBase64) {
    let dir: string | undefined;
    try {
      dir = fs.mkdtempSync(path.join(tempRoot, "release-tools-cert-"));
      const certPath = path.join(dir, "signing.pfx");
      fs.writeFileSync(certPath, Buffer.from(pfxBase64, "base64"), { mode: 0o600 });
      const certDir = dir;
      return {
        certificate: { kind: "file", path: certPath, password: options.pfxPassword },
        dispose: () => fs.rmSync(certDir, { recursive: true, force: true }),
      };
    } catch (err) {
      if (dir) fs.rmSync(dir, { recursive: true, force: true });
      return {
        error: `Could not write the signing certificate: ${errorMessage(err)}`,
        dispose: noop,
      };
    }
  }

  if (thumbprint) {
    return {
      warning:
        "Certificate store signing is only available on Windows; provide a PFX certificate to sign on this platform. Packages were not signed.",
      dispose: noop,
    };
  }

  return { dispose: noop };
}
