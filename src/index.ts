export { IoError, FormatError } from "./errors";
export { Stream, Encoder } from "./utils";
export type { Vec3 } from "./utils";
export { readMdlHeader, MdlReader } from "./3d/mdlmodel";
export type { MdlHeader, MdlReadOpts, FrameRecord, SingleFrame, FrameGroupInfo, PackedVertex, SkinRecord, TextureVertex, TriangleIndex } from "./3d/mdlmodel";
export { unpackCoord, unpackVertex, reconstructFrame } from "./3d/framegeometry";
export type { ReconstructedTriangle, TriangleCorner } from "./3d/framegeometry";
export { writeTriFile, readTriFile, triFileSize } from "./3d/trifile";
export type { TriFile, TriObject } from "./3d/trifile";
export { writeLbm, readLbm, lbmFileSize } from "./3d/lbmimage";
export type { LbmImage, BitmapHeader } from "./3d/lbmimage";
export { defaultPalette, loadPaletteFile, paletteFromHexColors } from "./palette";
export type { Palette } from "./palette";
export { extractMdl, defaultExtractOpts } from "./scripts/extractmdl";
export type { ExtractOpts, ExtractSummary } from "./scripts/extractmdl";
export { inspectFile } from "./scripts/inspect";
export type { ScriptFS, ScriptOutput } from "./scriptrunner";
