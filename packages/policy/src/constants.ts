export const PACKAGE_NAME = "@tagwarden/policy" as const;

/** Pseudo tag whose attribute rules apply to every tag */
export const WILDCARD_TAG = ":all";

/** Pseudo protocol that admits in-page anchor links (`#section`) */
export const ANCHOR_PROTOCOL = "#";

/** URL attributes consulted by element-level domain checks, in order */
export const HREF_ATTRIBUTE = "href";
export const SRC_ATTRIBUTE = "src";

/** Log prefix for builder warnings */
export const LOG_TAG = "PolicyBuilder";
