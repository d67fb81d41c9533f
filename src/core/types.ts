/**
 * TextInput defines an exported type contract.
 */
export type TextInput = string | Uint8Array;

/**
 * AlgorithmInfo defines an exported structural contract.
 */
export interface AlgorithmInfo {
  name: string;
  standard: string;
  revisionOrDate: string;
  implementationId: string;
}

/**
 * Provenance defines an exported structural contract.
 */
export interface Provenance {
  algorithm: AlgorithmInfo;
  configHash: string;
  units: {
    text: "utf16-code-unit";
    byte?: "utf8-byte";
    codePoint?: "unicode-code-point";
    script?: "tallyscript-block-range";
  };
}
