export const BEGIN_MARKER = "/* BEGIN_ERRGOTRACE */";
export const END_MARKER = "/* END_ERRGOTRACE */";

export const BEGIN_REGEX = /^\/\* BEGIN_ERRGOTRACE \*\/$/;
export const END_REGEX = /^\/\* END_ERRGOTRACE \*\/$/;

/** Alias the support package is imported under; also the idempotency check. */
export const IMPORT_NAME = "__errgotrace";

/** Go import path of the package under runtime/. */
export const DEFAULT_IMPORT_PATH = "errgotrace/runtime";

export const INSPECT_FUNC = "InspectReturnValues";
export const SETUP_FUNC = "Setup";

/** Prefix of the renamed implementation and of the result placeholders. */
export const IMPL_PREFIX = "__";
export const RESULT_PREFIX = "__result";
