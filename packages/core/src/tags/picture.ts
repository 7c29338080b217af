// packages/core/src/tags/picture.ts

/** Picture type shared by ID3 APIC frames and FLAC PICTURE blocks. */
export const FRONT_COVER = 3;

export interface CoverPicture {
  mime        : string;
  description : string;
  pictureType : number;
  data        : Uint8Array;
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/** Covers are JPEG unless they carry the PNG signature. */
export function sniffImageMime(data: Uint8Array): string {
  return PNG_SIGNATURE.every((b, i) => data[i] === b) ? 'image/png' : 'image/jpeg';
}

export function frontCover(data: Uint8Array): CoverPicture {
  return {
    mime: sniffImageMime(data),
    description: 'Front Cover',
    pictureType: FRONT_COVER,
    data,
  };
}
