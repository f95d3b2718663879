/**
 * @actus-sm/codec: Boundary encoding.
 *
 * - Compact, deterministic binary layout for terms and state
 * - Human-readable JSON terms validated with zod
 * - SHA-256 over RFC 8785 canonical JSON for tamper evidence
 *
 * Malformed input always raises ValidationError.
 */

export { BinaryWriter, BinaryReader } from "./binary.js";

export { TERMS_CODEC_VERSION, encodeTerms, decodeTerms } from "./terms-codec.js";
export {
  STATE_CODEC_VERSION,
  ENCODED_STATE_LENGTH,
  encodeState,
  decodeState,
} from "./state-codec.js";

export {
  TermsInputSchema,
  ScheduleConfigInputSchema,
  parseTermsInput,
  parseTermsJson,
  termsToInput,
} from "./terms-schema.js";
export type { TermsInput } from "./terms-schema.js";

export {
  toCanonicalJson,
  sha256Canonical,
  computeStateHash,
  computeTermsHash,
} from "./hash.js";
