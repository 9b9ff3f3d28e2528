import type { CredentialProvider, ProviderName } from "@docchat/types";
import { AppError, PermanentProviderError } from "@docchat/errors";
import type { Logger } from "@docchat/logger";
import { decrypt } from "./encryption.js";
import type { EncryptedData } from "./encryption.js";

/**
 * Where sealed provider keys live. Owned by the account service; this side
 * only reads.
 */
export interface EncryptedCredentialSource {
  findCredential(ownerId: string, provider: ProviderName): Promise<EncryptedData | null>;
}

/**
 * Resolves an owner's provider key by decrypting the stored envelope. The
 * plaintext is returned to the caller and nowhere else.
 */
export class EncryptedCredentialProvider implements CredentialProvider {
  constructor(
    private readonly source: EncryptedCredentialSource,
    private readonly encryptionKey: string,
    private readonly logger?: Logger,
  ) {}

  async getCredential(ownerId: string, provider: ProviderName): Promise<string> {
    const sealed = await this.source.findCredential(ownerId, provider);
    if (!sealed) {
      throw new PermanentProviderError(
        `No ${provider} API key configured`,
        provider,
        "invalid-credential",
      );
    }

    let plaintext: string;
    try {
      plaintext = decrypt(sealed, this.encryptionKey);
    } catch (error) {
      this.logger?.error(
        { ownerId, provider, keyId: sealed.keyId, code: AppError.isAppError(error) ? error.code : undefined },
        "Stored credential could not be decrypted",
      );
      throw new PermanentProviderError(
        `Stored ${provider} API key could not be read`,
        provider,
        "invalid-credential",
        { cause: error },
      );
    }

    if (plaintext.trim().length === 0) {
      throw new PermanentProviderError(`Stored ${provider} API key is empty`, provider, "invalid-credential");
    }
    return plaintext;
  }
}

/** Fixed keys, for tests and local runs. */
export class StaticCredentialProvider implements CredentialProvider {
  constructor(private readonly keys: Partial<Record<ProviderName, string>>) {}

  getCredential(_ownerId: string, provider: ProviderName): Promise<string> {
    const key = this.keys[provider];
    if (key === undefined || key.length === 0) {
      return Promise.reject(
        new PermanentProviderError(`No ${provider} API key configured`, provider, "invalid-credential"),
      );
    }
    return Promise.resolve(key);
  }
}
