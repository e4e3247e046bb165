/** Redis key layout shared by the auth and rate-limit middleware. */
export const RKeys = {
  // access-token denylist entry, set by the identity service on logout
  atBlock: (jti: string) => `at:block:${jti}`,
  rlBucket: (bucket: string) => `rl:${bucket}`,
};
