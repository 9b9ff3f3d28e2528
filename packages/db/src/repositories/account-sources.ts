import { and, eq } from "drizzle-orm";
import type { ModelPreferenceSource, ModelPreferences, ProviderName } from "@docchat/types";
import { DEFAULT_MODEL_PREFERENCES } from "@docchat/types";
import type { EncryptedCredentialSource, EncryptedData } from "@docchat/crypto";
import type { Database } from "../client.js";
import { modelPreferences, providerCredentials } from "../schema/index.js";

/** Owners without a stored row get `DEFAULT_MODEL_PREFERENCES`. */
export class DrizzleModelPreferenceSource implements ModelPreferenceSource {
  constructor(private readonly db: Database) {}

  async getPreferences(ownerId: string): Promise<ModelPreferences> {
    const [row] = await this.db
      .select({
        embeddingProvider: modelPreferences.embeddingProvider,
        embeddingModel: modelPreferences.embeddingModel,
        completionProvider: modelPreferences.completionProvider,
        chatModel: modelPreferences.chatModel,
      })
      .from(modelPreferences)
      .where(eq(modelPreferences.ownerId, ownerId))
      .limit(1);
    return row ?? { ...DEFAULT_MODEL_PREFERENCES };
  }
}

export class DrizzleCredentialSource implements EncryptedCredentialSource {
  constructor(private readonly db: Database) {}

  async findCredential(ownerId: string, provider: ProviderName): Promise<EncryptedData | null> {
    const [row] = await this.db
      .select({
        iv: providerCredentials.iv,
        ciphertext: providerCredentials.ciphertext,
        tag: providerCredentials.tag,
        keyId: providerCredentials.keyId,
      })
      .from(providerCredentials)
      .where(and(eq(providerCredentials.ownerId, ownerId), eq(providerCredentials.provider, provider)))
      .limit(1);
    return row ?? null;
  }
}
