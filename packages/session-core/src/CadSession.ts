import { Vector3 } from "three";
import type {
  Bullet,
  CadSessionConfig,
  CadSessionState,
  CadTool,
  Debris,
  NormalAction,
  Primitive,
  SceneObject,
  SessionCommand,
  Vec3,
} from "./types";
import { PRIMITIVES } from "./types";

const DEFAULT_CONFIG: Required<CadSessionConfig> = {
  gridSize: 0.5,
  snapToGrid: true,
  selectRadius: 0.5,
  minScale: 0.1,
  maxScale: 5,
  moveRate: 5,
  scaleRate: 2,
  extrudeRate: 3,
  cameraFollowRate: 1.5,
  cameraHome: [0, 3, -8],
  bulletSpeed: 20,
  bulletRange: 50,
  hitRadius: 1,
  debrisLifetime: 2,
  droneSpin: 120,
  random: Math.random,
};

const BOX_COLORS = ["red", "blue", "green", "yellow", "orange", "cyan", "magenta", "lime"];
const DEBRIS_COLORS = ["red", "orange", "yellow", "white"];
const DEBRIS_PER_EXPLOSION = 15;
const CAMERA_FORWARD = new Vector3(0, 0, 1);

/** Maps normalized hand space onto the scene: x to [-10, 10], y to [7.5, -7.5], z to [0, 10]. */
export function handToWorld(position: Vec3): Vec3 {
  return [(position[0] - 0.5) * 20, (0.5 - position[1]) * 15, position[2] * 10];
}

export function snapToGrid(position: Vec3, gridSize: number): Vec3 {
  return [
    Math.round(position[0] / gridSize) * gridSize,
    Math.round(position[1] / gridSize) * gridSize,
    Math.round(position[2] / gridSize) * gridSize,
  ];
}

function toVec3(v: Vector3): Vec3 {
  return [v.x, v.y, v.z];
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function mergeConfig(config?: CadSessionConfig): Required<CadSessionConfig> {
  return { ...DEFAULT_CONFIG, ...(config ?? {}) };
}

type PendingExtrude = { worldY: number; strength: number };

/**
 * Scene-side owner of everything the gesture pipeline must not touch directly:
 * objects, selection, current tool and camera. Discrete commands apply immediately in
 * `handle`; continuous ones (move, scale, extrude, camera follow) are integrated by
 * `update` so their speed follows the render clock.
 */
export class CadSession {
  private config: Required<CadSessionConfig>;
  private state: CadSessionState;
  private nextId = 1;
  private pendingMove: Vec3 | null = null;
  private pendingScale: number | null = null;
  private pendingExtrude: PendingExtrude | null = null;
  private cameraTarget: Vec3 | null = null;

  constructor(config?: CadSessionConfig) {
    this.config = mergeConfig(config);
    this.state = {
      mode: "normal",
      tool: "select",
      primitive: "box",
      gridVisible: false,
      objects: [],
      bullets: [],
      debris: [],
      camera: { position: [...this.config.cameraHome], following: false },
    };
  }

  handle(command: SessionCommand): void {
    switch (command.type) {
      case "MODE_TOGGLED":
        this.state.mode = command.mode;
        this.cameraTarget = null;
        this.state.camera.following = false;
        if (command.mode === "cad") {
          this.setTool("select");
          this.state.gridVisible = true;
        } else {
          this.state.gridVisible = false;
          this.clearSelection();
        }
        break;
      case "TOOL_SELECTED":
        this.setTool(command.tool);
        break;
      case "ACTION":
        this.runAction(command.action, command.position);
        break;
      case "CAD_SELECT":
        this.selectObjectAt(handToWorld(command.position));
        break;
      case "CAD_PLACE":
        this.placeObjectAt(handToWorld(command.position));
        break;
      case "CAD_MOVE":
        this.pendingMove = this.snap(handToWorld(command.position));
        break;
      case "CAD_SCALE":
        this.pendingScale = command.scaleFactor;
        break;
      case "CAD_ROTATE": {
        const degrees = (command.position[0] - 0.5) * 5;
        for (const obj of this.selected()) obj.rotationY += degrees;
        break;
      }
      case "CAD_EXTRUDE":
        this.pendingExtrude = { worldY: handToWorld(command.position)[1], strength: command.strength };
        break;
      default: {
        const unhandled: never = command;
        throw new Error(`Unhandled session command: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  handleAll(commands: readonly SessionCommand[]): void {
    for (const command of commands) this.handle(command);
  }

  update(dtSeconds: number): void {
    if (dtSeconds <= 0) return;
    this.applyMove(dtSeconds);
    this.applyScale(dtSeconds);
    this.applyExtrude(dtSeconds);
    this.followCamera(dtSeconds);
    this.advanceBullets(dtSeconds);
    this.advanceDebris(dtSeconds);

    for (const obj of this.state.objects) {
      if (obj.kind === "drone") obj.rotationY += this.config.droneSpin * dtSeconds;
    }
  }

  setTool(tool: CadTool): void {
    this.state.tool = tool;
  }

  cyclePrimitive(): Primitive {
    const index = PRIMITIVES.indexOf(this.state.primitive);
    this.state.primitive = PRIMITIVES[(index + 1) % PRIMITIVES.length];
    return this.state.primitive;
  }

  clearSelection(): void {
    for (const obj of this.state.objects) obj.selected = false;
  }

  getState(): CadSessionState {
    const copyObject = (obj: SceneObject): SceneObject => ({
      ...obj,
      position: [...obj.position],
      scale: [...obj.scale],
    });
    return {
      ...this.state,
      objects: this.state.objects.map(copyObject),
      bullets: this.state.bullets.map((b) => ({ ...b, position: [...b.position], velocity: [...b.velocity] })),
      debris: this.state.debris.map((d) => ({ ...d, position: [...d.position] })),
      camera: { ...this.state.camera, position: [...this.state.camera.position] },
    };
  }

  private runAction(action: NormalAction, handPosition: Vec3): void {
    if (action !== "camera_control") {
      this.cameraTarget = null;
      this.state.camera.following = false;
    }
    switch (action) {
      case "spawn_drone":
        this.addObject("drone", [this.randomIn(-6, 6), this.randomIn(2, 5), this.randomIn(-3, 8)], 0.8, "red");
        break;
      case "spawn_box": {
        const color = BOX_COLORS[Math.floor(this.config.random() * BOX_COLORS.length)] ?? "white";
        this.addObject("box", [this.randomIn(-5, 5), 1, this.randomIn(-2, 6)], this.randomIn(0.4, 1), color);
        break;
      }
      case "fire_bullet":
        this.state.bullets.push({
          id: this.takeId("bullet"),
          position: [...this.state.camera.position],
          velocity: toVec3(CAMERA_FORWARD.clone().multiplyScalar(this.config.bulletSpeed)),
        });
        break;
      case "rotate_objects":
        for (const obj of this.state.objects) obj.rotationY += this.randomIn(30, 90);
        break;
      case "explode":
        this.explode();
        break;
      case "camera_control":
        this.state.camera.following = true;
        this.cameraTarget = [
          (handPosition[0] - 0.5) * 6,
          Math.max(1, 3 - (handPosition[1] - 0.5) * 6),
          this.config.cameraHome[2],
        ];
        break;
      default: {
        const unhandled: never = action;
        throw new Error(`Unhandled action: ${String(unhandled)}`);
      }
    }
  }

  private selectObjectAt(world: Vec3): void {
    const target = new Vector3(...world);
    let closest: SceneObject | undefined;
    let closestDistance = Infinity;
    for (const obj of this.state.objects) {
      const distance = target.distanceTo(new Vector3(...obj.position));
      if (distance < closestDistance && distance < this.config.selectRadius) {
        closest = obj;
        closestDistance = distance;
      }
    }

    if (closest) {
      closest.selected = !closest.selected;
    } else {
      this.clearSelection();
    }
  }

  private placeObjectAt(world: Vec3): void {
    this.addObject(this.state.primitive, this.snap(world), 1, "white");
  }

  private applyMove(dt: number): void {
    const target = this.pendingMove;
    this.pendingMove = null;
    const selected = this.selected();
    if (!target || selected.length === 0) return;

    const center = new Vector3();
    for (const obj of selected) center.add(new Vector3(...obj.position));
    center.divideScalar(selected.length);
    const offset = new Vector3(...target).sub(center);
    const alpha = Math.min(1, dt * this.config.moveRate);

    for (const obj of selected) {
      const current = new Vector3(...obj.position);
      obj.position = toVec3(current.clone().lerp(current.clone().add(offset), alpha));
    }
  }

  private applyScale(dt: number): void {
    const factor = this.pendingScale;
    this.pendingScale = null;
    if (factor === null) return;
    const growth = 1 + (factor - 1) * dt * this.config.scaleRate;
    const { minScale, maxScale } = this.config;
    for (const obj of this.selected()) {
      obj.scale = [
        clamp(obj.scale[0] * growth, minScale, maxScale),
        clamp(obj.scale[1] * growth, minScale, maxScale),
        clamp(obj.scale[2] * growth, minScale, maxScale),
      ];
    }
  }

  private applyExtrude(dt: number): void {
    const extrude = this.pendingExtrude;
    this.pendingExtrude = null;
    if (!extrude) return;
    const target = Math.max(0.1, extrude.worldY * extrude.strength * 2);
    const alpha = Math.min(1, dt * this.config.extrudeRate);
    for (const obj of this.selected()) {
      // Only boxes have a face to pull.
      if (obj.kind !== "box") continue;
      const current = obj.scale[1];
      const next = current + (target - current) * alpha;
      obj.scale = [obj.scale[0], next, obj.scale[2]];
      obj.position = [obj.position[0], obj.position[1] + (next - current) / 2, obj.position[2]];
    }
  }

  private followCamera(dt: number): void {
    if (!this.cameraTarget) return;
    const alpha = Math.min(1, dt * this.config.cameraFollowRate);
    const position = new Vector3(...this.state.camera.position).lerp(new Vector3(...this.cameraTarget), alpha);
    this.state.camera.position = toVec3(position);
  }

  private advanceBullets(dt: number): void {
    const survivors: Bullet[] = [];
    const origin = new Vector3();
    for (const bullet of this.state.bullets) {
      const position = new Vector3(...bullet.position).add(new Vector3(...bullet.velocity).multiplyScalar(dt));
      bullet.position = toVec3(position);

      const hit = this.state.objects.find(
        (obj) => obj.kind !== "drone" && position.distanceTo(new Vector3(...obj.position)) < this.config.hitRadius
      );
      if (hit) {
        this.state.objects = this.state.objects.filter((obj) => obj !== hit);
        continue;
      }
      if (position.distanceTo(origin) > this.config.bulletRange) continue;
      survivors.push(bullet);
    }
    this.state.bullets = survivors;
  }

  private advanceDebris(dt: number): void {
    const remaining: Debris[] = [];
    for (const piece of this.state.debris) {
      const ttl = piece.ttl - dt;
      if (ttl > 0) remaining.push({ ...piece, ttl });
    }
    this.state.debris = remaining;
  }

  private explode(): void {
    const center: Vec3 = [this.randomIn(-5, 5), this.randomIn(0, 3), this.randomIn(-3, 5)];
    for (let i = 0; i < DEBRIS_PER_EXPLOSION; i++) {
      this.state.debris.push({
        id: this.takeId("debris"),
        position: [
          center[0] + this.randomIn(-2, 2),
          center[1] + this.randomIn(-1, 3),
          center[2] + this.randomIn(-2, 2),
        ],
        size: this.randomIn(0.2, 0.8),
        color: DEBRIS_COLORS[Math.floor(this.config.random() * DEBRIS_COLORS.length)] ?? "white",
        ttl: this.config.debrisLifetime,
      });
    }
  }

  private addObject(kind: SceneObject["kind"], position: Vec3, size: number, color: string): SceneObject {
    const obj: SceneObject = {
      id: this.takeId(kind),
      kind,
      position,
      scale: [size, size, size],
      rotationY: 0,
      color,
      selected: false,
    };
    this.state.objects.push(obj);
    return obj;
  }

  private selected(): SceneObject[] {
    return this.state.objects.filter((obj) => obj.selected);
  }

  private snap(world: Vec3): Vec3 {
    return this.config.snapToGrid ? snapToGrid(world, this.config.gridSize) : world;
  }

  private randomIn(min: number, max: number): number {
    return min + this.config.random() * (max - min);
  }

  private takeId(prefix: string): string {
    return `${prefix}-${this.nextId++}`;
  }
}

export { DEFAULT_CONFIG as defaultCadSessionConfig };
