/**
 * @module sources
 * @description Text sources that normalize pasted content for the core
 */

export { extractArtifactListing, looksLikeArtifactListing } from "./artifact-listing";

export { isTabularText, parsePastedText, textToCode } from "./pasted-text";
