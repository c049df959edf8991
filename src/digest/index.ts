export {
  DigestGenerator,
  DIGEST_SUBJECT,
  type DigestConfig,
  type Digest,
  type SkippedArticle,
} from "./generator.js";
export { DigestMailer, createSmtpTransport } from "./mailer.js";
