import type { Address } from 'viem';

export const A: Address = '0x1111111111111111111111111111111111111111';
export const B: Address = '0x2222222222222222222222222222222222222222';
export const C: Address = '0x3333333333333333333333333333333333333333';
export const D: Address = '0x4444444444444444444444444444444444444444';

// checksummed / lower-cased pairs
export const YCRV: Address = '0xFCc5c47bE19d06BF83eB04298b026F81069ff65b';
export const YCRV_LOWER: Address = '0xfcc5c47be19d06bf83eb04298b026f81069ff65b';
export const BLUE: Address = '0x96B00208911d72eA9f10c3303fF319427A7884C9';
export const BAND: Address = '0xe154A435408211AC89757B76C4FbE4Dc9ED2Ef27';
export const BAND_LOWER: Address = '0xe154a435408211ac89757b76c4fbe4dc9ed2ef27';
export const MIXED: Address = '0xABcdEFABcdEFabcdEfAbCdefabcdeFABcDEFabCD';
export const MIXED_LOWER: Address = '0xabcdefabcdefabcdefabcdefabcdefabcdefabcd';
