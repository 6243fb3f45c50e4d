import { describe, expect, it } from "vitest";
import { ActionDispatcher, createCadModeDispatcher, createNormalModeDispatcher } from "../src";

describe("normal mode dispatcher", () => {
  it("maps gestures to actions", () => {
    const dispatcher = createNormalModeDispatcher(800);
    expect(dispatcher.dispatch("fist", 0)).toBe("spawn_drone");
    dispatcher.reset();
    expect(dispatcher.dispatch("rock_sign", 0)).toBe("explode");
  });

  it("shares one cooldown across discrete gestures", () => {
    const dispatcher = createNormalModeDispatcher(1000);
    expect(dispatcher.dispatch("fist", 0)).toBe("spawn_drone");
    expect(dispatcher.dispatch("fist", 500)).toBeNull();
    expect(dispatcher.dispatch("peace", 999)).toBeNull();
    expect(dispatcher.dispatch("peace", 1000)).toBe("fire_bullet");
  });

  it("never throttles camera control and never starts a cooldown with it", () => {
    const dispatcher = createNormalModeDispatcher(1000);
    expect(dispatcher.dispatch("open_palm", 0)).toBe("camera_control");
    expect(dispatcher.dispatch("open_palm", 10)).toBe("camera_control");
    expect(dispatcher.dispatch("thumbs_up", 20)).toBe("rotate_objects");
    expect(dispatcher.dispatch("open_palm", 30)).toBe("camera_control");
  });

  it("dispatches nothing for unknown and leaves the cooldown alone", () => {
    const dispatcher = createNormalModeDispatcher(1000);
    expect(dispatcher.dispatch("unknown", 0)).toBeNull();
    expect(dispatcher.dispatch("pinch", 1)).toBe("spawn_box");
  });
});

describe("CAD mode dispatcher", () => {
  it("throttles select and create with one timer", () => {
    const dispatcher = createCadModeDispatcher(1000);
    expect(dispatcher.dispatch("select", 0)).toBe("CAD_SELECT");
    expect(dispatcher.dispatch("create", 400)).toBeNull();
    expect(dispatcher.dispatch("create", 1000)).toBe("CAD_PLACE");
  });

  it("lets continuous tools through every frame", () => {
    const dispatcher = createCadModeDispatcher(1000);
    dispatcher.dispatch("create", 0);
    expect([16, 32, 48].map((t) => dispatcher.dispatch("move", t))).toEqual(["CAD_MOVE", "CAD_MOVE", "CAD_MOVE"]);
    expect(dispatcher.dispatch("extrude", 60)).toBe("CAD_EXTRUDE");
  });
});

describe("ActionDispatcher", () => {
  it("works with any gesture vocabulary", () => {
    const dispatcher = new ActionDispatcher({ actions: { wave: 1, nod: 2 }, cooldownMs: 100, exempt: ["nod"] });
    expect(dispatcher.dispatch("wave", 0)).toBe(1);
    expect(dispatcher.dispatch("wave", 50)).toBeNull();
    expect(dispatcher.dispatch("nod", 50)).toBe(2);
  });
});
