/**
 * Descriptor metainfo module.
 *
 * @module engine/torrent
 */

export {
  PIECE_HASH_LENGTH,
  MetaInfoError,
  parseInfo,
  infoFromDefinition,
  decodeMetaInfo,
  encodeMetaInfo,
  buildMetaInfo,
  infoHashOf,
  upvertedAnnounceList,
  toDescriptorSpec,
  type InfoFile,
  type InfoDefinition,
  type AdditionalMetaInfo,
  type MetaInfo,
  type DescriptorFile,
  type DescriptorMetadata,
  type DescriptorSpec,
  type BuildOptions,
} from './metainfo.js';
