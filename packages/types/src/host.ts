// Snapshot of host data handed to the planner. The live shader graph never
// crosses this boundary; only an opaque handle and a classification do.

/** Which networks feed the material output's surface socket. */
export type ShaderClassification = 'principled-only' | 'custom-only' | 'mixed'

export interface MaterialSlot {
  slotIndex: number
  materialId: string
  materialName: string
  /** Opaque handle into host graph storage. */
  shaderGraph: string
  uvSet: string
  classification: ShaderClassification
  /** Input socket names present on the material's Principled node. */
  principledInputs?: readonly string[]
  /** Output socket of the custom network, `Shader` when omitted. */
  customOutput?: string
}

export interface UvCoordinate {
  u: number
  v: number
}

export interface HostObject {
  id: string
  name: string
  slots: readonly MaterialSlot[]
  /** Tile ids reported by the host for UDIM auto-detection. */
  udimTiles?: readonly number[]
  /** Raw UV coordinates, used for auto-detection when no tile ids are reported. */
  uvs?: readonly UvCoordinate[]
}

export interface HostSelection {
  objects: readonly HostObject[]
}
