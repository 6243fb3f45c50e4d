export type Vec3 = [number, number, number];

export type InteractionMode = "normal" | "cad";

export const CAD_TOOLS = ["select", "create", "move", "scale", "rotate", "extrude"] as const;
export type CadTool = (typeof CAD_TOOLS)[number];

export const NORMAL_ACTIONS = [
  "spawn_drone",
  "fire_bullet",
  "spawn_box",
  "rotate_objects",
  "explode",
  "camera_control",
] as const;
export type NormalAction = (typeof NORMAL_ACTIONS)[number];

export const PRIMITIVES = ["box", "sphere", "cylinder", "pyramid"] as const;
export type Primitive = (typeof PRIMITIVES)[number];

/**
 * Everything the gesture pipeline can ask of the scene. Positions are in normalized
 * hand space (x/y in [0,1], z relative depth); the session maps them to world space.
 */
export type SessionCommand =
  | { type: "MODE_TOGGLED"; mode: InteractionMode }
  | { type: "TOOL_SELECTED"; tool: CadTool; confidence: number }
  | { type: "ACTION"; action: NormalAction; position: Vec3 }
  | { type: "CAD_SELECT"; position: Vec3 }
  | { type: "CAD_PLACE"; position: Vec3 }
  | { type: "CAD_MOVE"; position: Vec3 }
  | { type: "CAD_SCALE"; scaleFactor: number }
  | { type: "CAD_ROTATE"; position: Vec3; direction: Vec3 }
  | { type: "CAD_EXTRUDE"; position: Vec3; strength: number };

export type CadCommand = Extract<SessionCommand, { type: `CAD_${string}` }>;

export type SceneObjectKind = Primitive | "drone";

export interface SceneObject {
  id: string;
  kind: SceneObjectKind;
  position: Vec3;
  scale: Vec3;
  /** Degrees around the vertical axis. */
  rotationY: number;
  color: string;
  selected: boolean;
}

export interface Bullet {
  id: string;
  position: Vec3;
  velocity: Vec3;
}

export interface Debris {
  id: string;
  position: Vec3;
  size: number;
  color: string;
  /** Seconds left before the piece disappears. */
  ttl: number;
}

export interface CameraState {
  position: Vec3;
  following: boolean;
}

export interface CadSessionState {
  mode: InteractionMode;
  tool: CadTool;
  primitive: Primitive;
  gridVisible: boolean;
  objects: SceneObject[];
  bullets: Bullet[];
  debris: Debris[];
  camera: CameraState;
}

export interface CadSessionConfig {
  gridSize?: number;
  snapToGrid?: boolean;
  selectRadius?: number;
  minScale?: number;
  maxScale?: number;
  moveRate?: number;
  scaleRate?: number;
  extrudeRate?: number;
  cameraFollowRate?: number;
  cameraHome?: Vec3;
  bulletSpeed?: number;
  bulletRange?: number;
  hitRadius?: number;
  debrisLifetime?: number;
  /** Degrees per second. */
  droneSpin?: number;
  /** Uniform source in [0, 1); swap for a seeded one in tests. */
  random?: () => number;
}

export interface SnapshotLike {
  commands: SessionCommand[];
}
