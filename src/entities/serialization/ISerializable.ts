export interface ISerializable<TDto> {
  serialize(): TDto
}

/**
 * Reads a document node of unknown shape; implementations validate before building.
 */
export interface IDeserializable<TEntity> {
  deserialize(node: unknown): TEntity
}
