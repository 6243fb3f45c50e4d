import type { CadCommand, CadTool, InteractionMode, NormalAction, SessionCommand } from "@handcad/session-core";
import { createCadModeDispatcher, createNormalModeDispatcher } from "./ActionDispatcher";
import type { ActionDispatcher } from "./ActionDispatcher";
import { GestureClassifier, pickGesture, scoreGestures } from "./GestureClassifier";
import { isAllExtended } from "./geometry";
import { LandmarkFilter } from "./LandmarkFilter";
import { HandLandmark, assertHandFrame, toVec3 } from "./landmarks";
import { ModeToggle } from "./ModeToggle";
import { resolveOptions } from "./options";
import type { ResolvedGestureOptions } from "./options";
import { PrecisionGestureDetector } from "./PrecisionGestureDetector";
import { classifyTool } from "./ToolClassifier";
import type {
  CoarseGesture,
  GestureConfidence,
  GestureEngineOptions,
  GestureHistoryEntry,
  GestureLabel,
  GestureSnapshot,
  HandFrame,
  HandResult,
  PrecisionGestures,
  TrackedHand,
} from "./types";

/** Minimum confidence of the precision gesture each tool reads before it acts. */
const CAD_GATES: Record<CadTool, number> = {
  select: 0.8,
  create: 0.8,
  move: 0.8,
  scale: 0.5,
  rotate: 0.7,
  extrude: 0.8,
};

function cadSource(tool: CadTool, gestures: PrecisionGestures): { confidence: number } | undefined {
  switch (tool) {
    case "select":
    case "create":
      return gestures.precisionPoint;
    case "move":
    case "extrude":
      return gestures.pinch;
    case "scale":
      return gestures.spreadScale;
    case "rotate":
      return gestures.threeFingerControl;
    default: {
      const unhandled: never = tool;
      throw new Error(`Unhandled tool: ${String(unhandled)}`);
    }
  }
}

function buildCadCommand(type: CadCommand["type"], gestures: PrecisionGestures): CadCommand | null {
  const { precisionPoint, pinch, spreadScale, threeFingerControl } = gestures;
  switch (type) {
    case "CAD_SELECT":
      return precisionPoint ? { type, position: precisionPoint.position } : null;
    case "CAD_PLACE":
      return precisionPoint ? { type, position: precisionPoint.position } : null;
    case "CAD_MOVE":
      return pinch ? { type, position: pinch.position } : null;
    case "CAD_EXTRUDE":
      return pinch ? { type, position: pinch.position, strength: pinch.strength } : null;
    case "CAD_SCALE":
      return { type, scaleFactor: spreadScale.scaleFactor };
    case "CAD_ROTATE":
      return threeFingerControl
        ? { type, position: threeFingerControl.position, direction: threeFingerControl.direction }
        : null;
    default: {
      const unhandled: never = type;
      throw new Error(`Unhandled CAD command: ${String(unhandled)}`);
    }
  }
}

/**
 * Per-frame driver of the gesture core. Runs on the acquisition cadence: feed it every
 * `HandFrame` and hand the returned snapshot to the scene side. The lowest `handIndex`
 * present is the primary hand; it alone arms the mode toggle, selects tools and
 * dispatches actions.
 */
export class GestureEngine {
  private readonly options: ResolvedGestureOptions;
  private readonly classifier: GestureClassifier;
  private readonly detector: PrecisionGestureDetector;
  private readonly modeToggle: ModeToggle;
  private readonly normalDispatcher: ActionDispatcher<CoarseGesture, NormalAction>;
  private readonly cadDispatcher: ActionDispatcher<CadTool, CadCommand["type"]>;
  private filters = new Map<number, LandmarkFilter>();
  private mode: InteractionMode;
  private tool: CadTool = "select";
  private lastTimestamp?: number;

  constructor(opts?: GestureEngineOptions) {
    this.options = resolveOptions(opts);
    this.mode = this.options.initialMode;
    this.classifier = new GestureClassifier(this.options);
    this.detector = new PrecisionGestureDetector(this.options);
    this.modeToggle = new ModeToggle(this.options.modeToggleHoldMs);
    this.normalDispatcher = createNormalModeDispatcher(this.options.actionCooldownMs);
    this.cadDispatcher = createCadModeDispatcher(this.options.toolCooldownMs);
  }

  /** Throws MalformedHandError before touching any state if the timestamp or a hand is malformed. */
  update(frame: HandFrame): GestureSnapshot {
    assertHandFrame(frame);
    const commands: SessionCommand[] = [];
    const dt = this.lastTimestamp === undefined ? 0 : Math.max(0, frame.timestamp - this.lastTimestamp);
    this.lastTimestamp = frame.timestamp;

    const hands = [...frame.hands].sort((a, b) => a.handIndex - b.handIndex);
    this.dropLostHands(hands);
    const primary: TrackedHand | undefined = hands[0];

    const poseHeld = primary !== undefined && isAllExtended(primary.landmarks, this.options.thumbAlignmentThreshold);
    if (this.modeToggle.update(poseHeld, dt)) {
      this.setMode(this.mode === "cad" ? "normal" : "cad");
      commands.push({ type: "MODE_TOGGLED", mode: this.mode });
    }

    const results = hands.map((hand, position) =>
      this.mode === "cad" ? this.processCadHand(hand) : this.processNormalHand(hand, frame.timestamp, position === 0)
    );

    let gesture: GestureLabel = "unknown";
    let confidences: GestureConfidence | null = null;
    let precision: PrecisionGestures | null = null;
    const lead = results[0];
    if (primary && lead) {
      if (lead.classification) {
        gesture = lead.classification.gesture;
        confidences = lead.classification.confidences;
        const action = this.normalDispatcher.dispatch(gesture, frame.timestamp);
        if (action) {
          commands.push({ type: "ACTION", action, position: toVec3(primary.landmarks[HandLandmark.INDEX_TIP]) });
        }
      }
      if (lead.precision) {
        precision = lead.precision;
        if (lead.tool && lead.tool.confidence > this.options.toolAcceptanceThreshold && lead.tool.tool !== this.tool) {
          this.tool = lead.tool.tool;
          commands.push({ type: "TOOL_SELECTED", tool: lead.tool.tool, confidence: lead.tool.confidence });
        }
        const command = this.cadCommand(lead.precision, frame.timestamp);
        if (command) commands.push(command);
      }
    }

    return {
      timestamp: frame.timestamp,
      mode: this.mode,
      gesture,
      confidences,
      precision,
      tool: this.tool,
      modeToggle: this.modeToggle.getStatus(),
      hands: results,
      commands,
    };
  }

  getMode(): InteractionMode {
    return this.mode;
  }

  getTool(): CadTool {
    return this.tool;
  }

  /** Direct override; the classifier can replace it on the next qualifying frame. */
  setTool(tool: CadTool): void {
    this.tool = tool;
  }

  getConfidences(): GestureConfidence {
    return this.classifier.getConfidences();
  }

  getHistory(): GestureHistoryEntry[] {
    return this.classifier.getHistory();
  }

  reset(): void {
    this.filters.clear();
    this.classifier.reset();
    this.modeToggle.reset();
    this.normalDispatcher.reset();
    this.cadDispatcher.reset();
    this.mode = this.options.initialMode;
    this.tool = "select";
    this.lastTimestamp = undefined;
  }

  private setMode(mode: InteractionMode): void {
    this.mode = mode;
    // Filters restart on every mode change: frames skipped in normal mode would read as one huge jump.
    this.filters.clear();
    if (mode === "cad") {
      this.tool = "select";
      this.cadDispatcher.reset();
    }
  }

  private processNormalHand(hand: TrackedHand, timestamp: number, isPrimary: boolean): HandResult {
    const classification = isPrimary
      ? this.classifier.classify(hand.landmarks, timestamp)
      : this.classifySecondary(hand);
    return { handIndex: hand.handIndex, handedness: hand.handedness, classification };
  }

  private classifySecondary(hand: TrackedHand): HandResult["classification"] {
    const confidences = scoreGestures(hand.landmarks, this.options);
    return { gesture: pickGesture(confidences, this.options.acceptanceThreshold), confidences };
  }

  private processCadHand(hand: TrackedHand): HandResult {
    const filter = this.ensureFilter(hand.handIndex);
    const filtered = filter.update(hand.landmarks);
    return {
      handIndex: hand.handIndex,
      handedness: hand.handedness,
      filtered,
      precision: this.detector.detect(filtered),
      tool: classifyTool(filtered.landmarks, this.options.precisionExtensionJoint, this.options.thumbAlignmentThreshold),
    };
  }

  private cadCommand(gestures: PrecisionGestures, now: number): CadCommand | null {
    const source = cadSource(this.tool, gestures);
    if (!source || source.confidence <= CAD_GATES[this.tool]) return null;
    const type = this.cadDispatcher.dispatch(this.tool, now);
    return type ? buildCadCommand(type, gestures) : null;
  }

  private ensureFilter(handIndex: number): LandmarkFilter {
    let filter = this.filters.get(handIndex);
    if (!filter) {
      filter = new LandmarkFilter(this.options);
      this.filters.set(handIndex, filter);
    }
    return filter;
  }

  private dropLostHands(hands: TrackedHand[]): void {
    const present = new Set(hands.map((hand) => hand.handIndex));
    for (const handIndex of [...this.filters.keys()]) {
      if (!present.has(handIndex)) this.filters.delete(handIndex);
    }
  }
}
