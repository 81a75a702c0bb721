import sodium from "libsodium-wrappers";

/**
 * Encrypts `plaintext` for the holder of `publicKeyBase64` with a libsodium
 * sealed box. The result is base64, the format GitHub expects for secrets.
 */
export async function sealSecret(publicKeyBase64: string, plaintext: string): Promise<string> {
  await sodium.ready;

  const publicKey = sodium.from_base64(publicKeyBase64, sodium.base64_variants.ORIGINAL);
  const sealed = sodium.crypto_box_seal(sodium.from_string(plaintext), publicKey);

  return sodium.to_base64(sealed, sodium.base64_variants.ORIGINAL);
}
