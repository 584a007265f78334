/** HMAC-SHA256 output size; also the fixed suffix length of a signed envelope. */
export const TAG_LENGTH = 32;

/** Raw signing key size in bytes. */
export const KEY_LENGTH = 32;

/** Length of a key in its canonical hex text form. */
export const KEY_HEX_LENGTH = KEY_LENGTH * 2;
