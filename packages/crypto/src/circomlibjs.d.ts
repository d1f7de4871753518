declare module 'circomlibjs' {
  export interface PoseidonField {
    toObject(value: Uint8Array): bigint;
  }

  export interface Poseidon {
    (inputs: readonly bigint[]): Uint8Array;
    F: PoseidonField;
  }

  export function buildPoseidon(): Promise<Poseidon>;
}
