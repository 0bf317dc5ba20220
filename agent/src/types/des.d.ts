// des.js ships no type declarations.
declare module 'des.js' {
  interface CipherOptions {
    type: 'encrypt' | 'decrypt';
    key: number[] | Uint8Array;
    padding?: boolean;
  }

  interface Cipher {
    update(data: number[] | Uint8Array): number[];
    final(data?: number[] | Uint8Array): number[];
  }

  const des: {
    DES: { create(options: CipherOptions): Cipher };
  };
  export default des;
}
