/**
 * Schema barrel export.
 * All V1 wire types used by the issuer API.
 */

export {
  Hex32String,
  U64String,
  Base64Signature,
  SignedRequest,
  parseU64,
} from "./common.js";

export {
  MintPayloadV1,
  MintRequestV1,
  MINT_OP,
  MAX_TIER_LENGTH,
  MAX_METADATA_LENGTH,
} from "./mint.js";

export {
  SetPublicKeyV1,
  SetFeeRateV1,
  SetPriceFeedV1,
  SetVerifiedV1,
  SetExpiryV1,
  SetMetadataV1,
  ADMIN_OPS,
  type AdminOp,
} from "./admin.js";

export { CredentialV1, IssuerInfoV1 } from "./credential.js";
