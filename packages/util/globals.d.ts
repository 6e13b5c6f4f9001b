/** Enables contract assertions. Defined by the test runner; undefined in release builds. */
declare const __DEBUG: boolean;
