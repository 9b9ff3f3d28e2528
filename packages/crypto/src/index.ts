export { encrypt, decrypt, deriveKeyId, isEncryptedData } from "./encryption.js";
export type { EncryptedData } from "./encryption.js";

export { EncryptedCredentialProvider, StaticCredentialProvider } from "./credential-provider.js";
export type { EncryptedCredentialSource } from "./credential-provider.js";
