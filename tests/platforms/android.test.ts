/**
 * Tests for src/platforms/android.ts
 *
 * We mock the exec utilities and the delay helper so no real ADB commands
 * run and no test waits. This lets us test command-string construction,
 * device-list parsing, screen-state detection and app lookup.
 */

import { exec, execWithCode } from "../../src/utils/exec.js";
import { delay } from "../../src/utils/delay.js";
import { clearDeviceCache } from "../../src/platforms/device-info.js";
import * as androidMod from "../../src/platforms/android.js";
import { AdbCommandError } from "../../src/types.js";
import { GETEVENT_PL, NOT_ROOTED, OK, ROOT_ID, WM_SIZE, midRandom } from "../fixtures/index.js";

jest.mock("../../src/utils/exec", () => ({
  ...jest.requireActual<typeof import("../../src/utils/exec")>("../../src/utils/exec"),
  exec: jest.fn(),
  execWithCode: jest.fn(),
}));
jest.mock("../../src/utils/delay", () => ({
  delay: jest.fn(() => Promise.resolve()),
}));

const mockExec = jest.mocked(exec);
const mockExecWithCode = jest.mocked(execWithCode);
const mockDelay = jest.mocked(delay);

beforeAll(() => {
  jest.spyOn(console, "error").mockImplementation(() => {});
});

beforeEach(() => {
  mockExec.mockReset();
  mockExec.mockResolvedValue("");
  mockExecWithCode.mockReset();
  mockDelay.mockClear();
  clearDeviceCache();
});

// ---------------------------------------------------------------------------
// listDevices
// ---------------------------------------------------------------------------
describe("listDevices", () => {
  it("parses a standard adb devices -l output with one device", async () => {
    mockExec.mockResolvedValueOnce(
      "List of devices attached\nemulator-5554          device product:sdk_gphone64_arm64 model:sdk_gphone64_arm64 transport_id:1\n\n",
    );
    const devices = await androidMod.listDevices();
    expect(devices).toEqual([
      { id: "emulator-5554", name: "sdk_gphone64_arm64", status: "device" },
    ]);
    expect(mockExec).toHaveBeenCalledWith("adb devices -l");
  });

  it("parses multiple devices including an unauthorized one", async () => {
    mockExec.mockResolvedValueOnce(
      "List of devices attached\nemulator-5554          device model:Pixel_6\nABC123               unauthorized transport_id:2\n",
    );
    const devices = await androidMod.listDevices();
    expect(devices).toHaveLength(2);
    expect(devices[0].status).toBe("device");
    expect(devices[1].status).toBe("unauthorized");
    expect(devices[1].name).toBe("ABC123"); // no model token, falls back to id
  });

  it("returns an empty list when no devices are attached", async () => {
    mockExec.mockResolvedValueOnce("List of devices attached\n\n");
    await expect(androidMod.listDevices()).resolves.toEqual([]);
  });

  it("skips lines starting with *", async () => {
    mockExec.mockResolvedValueOnce(
      "List of devices attached\n* daemon not running; starting now at tcp:5037\nemulator-5554  device model:Pixel\n",
    );
    const devices = await androidMod.listDevices();
    expect(devices.map((d) => d.id)).toEqual(["emulator-5554"]);
  });
});

// ---------------------------------------------------------------------------
// tap
// ---------------------------------------------------------------------------
describe("tap", () => {
  it("falls back to input tap on a device without root", async () => {
    mockExecWithCode.mockResolvedValueOnce(NOT_ROOTED);

    const method = await androidMod.tap(100, 200, { deviceId: "dev1", delayMs: 250 });

    expect(method).toBe("input");
    expect(mockExecWithCode).toHaveBeenCalledWith("adb -s dev1 shell su -c id");
    expect(mockExec).toHaveBeenCalledWith("adb -s dev1 shell input tap 100 200");
    expect(mockDelay).toHaveBeenCalledWith(250);
  });

  it("does not probe root when sendevent is disabled", async () => {
    await androidMod.tap(5, 6, { deviceId: "dev1", useSendevent: false, delayMs: 0 });

    expect(mockExecWithCode).not.toHaveBeenCalled();
    expect(mockExec).toHaveBeenCalledWith("adb -s dev1 shell input tap 5 6");
  });

  it("uses a humanized sendevent tap on a rooted device", async () => {
    mockExecWithCode.mockResolvedValueOnce(ROOT_ID);
    mockExec.mockResolvedValueOnce(GETEVENT_PL);
    mockExec.mockResolvedValueOnce(WM_SIZE);
    mockExec.mockResolvedValueOnce(GETEVENT_PL);
    mockExecWithCode.mockResolvedValueOnce(OK);

    const method = await androidMod.tap(540, 1200, {
      deviceId: "dev1",
      delayMs: 0,
      random: midRandom(),
    });

    expect(method).toBe("sendevent");
    const command = mockExecWithCode.mock.calls[1][0];
    expect(command.startsWith(`adb -s dev1 shell "su -c 'sendevent /dev/input/event2 3 57 0 && `)).toBe(true);
    expect(mockExec).not.toHaveBeenCalledWith("adb -s dev1 shell input tap 540 1200");
    // humanized pre/post pauses, then the action pause
    expect(mockDelay.mock.calls).toEqual([[100], [65], [0]]);
  });

  it("falls back to input tap when the rooted device has no touch panel", async () => {
    mockExecWithCode.mockResolvedValueOnce(ROOT_ID);
    mockExec.mockResolvedValueOnce("add device 1: /dev/input/event0\n");

    const method = await androidMod.tap(7, 8, { deviceId: "dev1", delayMs: 0 });

    expect(method).toBe("input");
    expect(mockExec).toHaveBeenLastCalledWith("adb -s dev1 shell input tap 7 8");
  });

  it("falls back to input tap when probing the touch panel fails", async () => {
    mockExecWithCode.mockResolvedValueOnce(ROOT_ID);
    mockExec.mockRejectedValueOnce(
      new AdbCommandError("adb -s dev1 shell getevent -pl", "getevent: timed out", 1),
    );

    const method = await androidMod.tap(7, 8, { deviceId: "dev1", delayMs: 0 });

    expect(method).toBe("input");
    expect(mockExec).toHaveBeenLastCalledWith("adb -s dev1 shell input tap 7 8");
  });

  it("falls back to input tap when the sendevent command times out", async () => {
    mockExecWithCode.mockResolvedValueOnce(ROOT_ID);
    mockExec.mockResolvedValueOnce(GETEVENT_PL);
    mockExec.mockResolvedValueOnce(WM_SIZE);
    mockExec.mockResolvedValueOnce(GETEVENT_PL);
    mockExecWithCode.mockRejectedValueOnce(new AdbCommandError("adb -s dev1 shell", "killed", null));

    const method = await androidMod.tap(7, 8, { deviceId: "dev1", delayMs: 0, random: midRandom() });

    expect(method).toBe("input");
    expect(mockExec).toHaveBeenLastCalledWith("adb -s dev1 shell input tap 7 8");
  });
});

// ---------------------------------------------------------------------------
// doubleTap / longPress / swipe
// ---------------------------------------------------------------------------
describe("doubleTap", () => {
  it("sends two input taps separated by the double-tap interval", async () => {
    await androidMod.doubleTap(300, 400, { deviceId: "dev1", delayMs: 0 });

    expect(mockExec.mock.calls).toEqual([
      ["adb -s dev1 shell input tap 300 400"],
      ["adb -s dev1 shell input tap 300 400"],
    ]);
    expect(mockDelay.mock.calls).toEqual([[100], [0]]);
  });
});

describe("longPress", () => {
  it("uses swipe-to-same-point with default 3000ms duration", async () => {
    await androidMod.longPress(10, 20, undefined, { deviceId: "dev1", delayMs: 0 });
    expect(mockExec).toHaveBeenCalledWith("adb -s dev1 shell input swipe 10 20 10 20 3000");
  });

  it("respects custom duration", async () => {
    await androidMod.longPress(10, 20, 2500, { deviceId: "dev1", delayMs: 0 });
    expect(mockExec).toHaveBeenCalledWith("adb -s dev1 shell input swipe 10 20 10 20 2500");
  });
});

describe("swipeDuration", () => {
  it("derives duration from squared distance within 1000-2000ms", () => {
    expect(androidMod.swipeDuration(0, 0, 300, 400)).toBe(1000); // 250 → 1000
    expect(androidMod.swipeDuration(0, 0, 0, 1200)).toBe(1440);
    expect(androidMod.swipeDuration(0, 0, 0, 2000)).toBe(2000); // 4000 → 2000
  });
});

describe("swipe", () => {
  it("computes the duration when none is given", async () => {
    const duration = await androidMod.swipe(540, 2000, 540, 800, undefined, {
      deviceId: "dev1",
      delayMs: 0,
    });
    expect(duration).toBe(1440);
    expect(mockExec).toHaveBeenCalledWith("adb -s dev1 shell input swipe 540 2000 540 800 1440");
  });

  it("uses custom duration", async () => {
    await androidMod.swipe(0, 0, 100, 100, 800, { deviceId: "dev1", delayMs: 0 });
    expect(mockExec).toHaveBeenCalledWith("adb -s dev1 shell input swipe 0 0 100 100 800");
  });
});

// ---------------------------------------------------------------------------
// Keys
// ---------------------------------------------------------------------------
describe("back / home", () => {
  it("sends keyevent 4 for back", async () => {
    await androidMod.back({ deviceId: "dev1", delayMs: 0 });
    expect(mockExec).toHaveBeenCalledWith("adb -s dev1 shell input keyevent 4");
  });

  it("sends KEYCODE_HOME for home", async () => {
    await androidMod.home({ delayMs: 0 });
    expect(mockExec).toHaveBeenCalledWith("adb shell input keyevent KEYCODE_HOME");
  });
});

describe("pressKey", () => {
  it("maps 'enter' to keyevent 66", async () => {
    await androidMod.pressKey("enter", { deviceId: "dev1" });
    expect(mockExec).toHaveBeenCalledWith("adb -s dev1 shell input keyevent 66");
    expect(mockDelay).not.toHaveBeenCalled();
  });

  it("pauses after the key when a delay is given", async () => {
    await androidMod.pressKey("volume_up", { deviceId: "dev1", delayMs: 750 });
    expect(mockExec).toHaveBeenCalledWith("adb -s dev1 shell input keyevent 24");
    expect(mockDelay).toHaveBeenCalledWith(750);
  });

  it("maps 'recent_apps' to keyevent 187", async () => {
    await androidMod.pressKey("recent_apps", { deviceId: "dev1" });
    expect(mockExec).toHaveBeenCalledWith("adb -s dev1 shell input keyevent 187");
  });

  it("throws for unknown keys", async () => {
    await expect(androidMod.pressKey("unknown_key", { deviceId: "dev1" })).rejects.toThrow(
      /Unknown key: unknown_key/,
    );
  });

  it("does not treat Object.prototype members as keys", async () => {
    await expect(androidMod.pressKey("toString", { deviceId: "dev1" })).rejects.toThrow(/Unknown key/);
  });
});

// ---------------------------------------------------------------------------
// Screen power and lock
// ---------------------------------------------------------------------------
describe("wakeScreen", () => {
  it("does nothing when the screen is already on", async () => {
    mockExec.mockResolvedValueOnce("  mWakefulness=Awake\n");
    await expect(androidMod.wakeScreen("dev1")).resolves.toBe(false);
    expect(mockExec).toHaveBeenCalledTimes(1);
    expect(mockExec).toHaveBeenCalledWith("adb -s dev1 shell dumpsys power");
  });

  it("sends KEYCODE_WAKEUP when the screen is off", async () => {
    mockExec.mockResolvedValueOnce("  mWakefulness=Asleep\nDisplay Power: state=OFF\n");
    await expect(androidMod.wakeScreen("dev1")).resolves.toBe(true);
    expect(mockExec).toHaveBeenLastCalledWith("adb -s dev1 shell input keyevent KEYCODE_WAKEUP");
    expect(mockDelay).toHaveBeenCalledWith(500);
  });
});

describe("sleepScreen", () => {
  it("sends KEYCODE_SLEEP when the display is on", async () => {
    mockExec.mockResolvedValueOnce("Display Power: state=ON\n");
    await expect(androidMod.sleepScreen("dev1")).resolves.toBe(true);
    expect(mockExec).toHaveBeenLastCalledWith("adb -s dev1 shell input keyevent KEYCODE_SLEEP");
    expect(mockDelay).toHaveBeenCalledWith(300);
  });

  it("does nothing when the screen is already off", async () => {
    mockExec.mockResolvedValueOnce("  mWakefulness=Dozing\n");
    await expect(androidMod.sleepScreen("dev1")).resolves.toBe(false);
    expect(mockExec).toHaveBeenCalledTimes(1);
  });
});

describe("unlockScreen", () => {
  it("swipes up from the bottom when the keyguard is showing", async () => {
    mockExec.mockResolvedValueOnce("mWakefulness=Awake"); // dumpsys power
    mockExec.mockResolvedValueOnce("    mDreamingLockscreen=true mDreamingSleepToken=null"); // dumpsys window
    mockExec.mockResolvedValueOnce(WM_SIZE);

    await expect(androidMod.unlockScreen({ deviceId: "dev1" })).resolves.toBe(true);
    expect(mockExec).toHaveBeenLastCalledWith("adb -s dev1 shell input swipe 540 2040 540 720 300");
  });

  it("swipes left to right when swipeUp is false", async () => {
    mockExec.mockResolvedValueOnce("mWakefulness=Awake");
    mockExec.mockResolvedValueOnce("isStatusBarKeyguard=true");
    mockExec.mockResolvedValueOnce(WM_SIZE);

    await androidMod.unlockScreen({ deviceId: "dev1", swipeUp: false });
    expect(mockExec).toHaveBeenLastCalledWith("adb -s dev1 shell input swipe 216 1200 864 1200 300");
  });

  it("returns false when the device is not locked", async () => {
    mockExec.mockResolvedValueOnce("mWakefulness=Awake");
    mockExec.mockResolvedValueOnce("mDreamingLockscreen=false isStatusBarKeyguard=false");

    await expect(androidMod.unlockScreen({ deviceId: "dev1" })).resolves.toBe(false);
    expect(mockExec).toHaveBeenCalledTimes(2);
  });
});

// ---------------------------------------------------------------------------
// Apps
// ---------------------------------------------------------------------------
describe("launchApp", () => {
  it("builds the monkey command for a known app", async () => {
    await expect(androidMod.launchApp("Settings", { deviceId: "dev1", delayMs: 0 })).resolves.toBe(true);
    expect(mockExec).toHaveBeenCalledWith(
      "adb -s dev1 shell monkey -p com.android.settings -c android.intent.category.LAUNCHER 1",
    );
  });

  it("returns false for an unknown app without calling adb", async () => {
    await expect(androidMod.launchApp("No Such App", { deviceId: "dev1" })).resolves.toBe(false);
    expect(mockExec).not.toHaveBeenCalled();
  });
});

describe("getCurrentApp", () => {
  it("names the focused app", async () => {
    mockExec.mockResolvedValueOnce(
      "  mCurrentFocus=Window{1a2b3c u0 com.android.chrome/com.google.android.apps.chrome.Main}\n",
    );
    await expect(androidMod.getCurrentApp("dev1")).resolves.toBe("Chrome");
    expect(mockExec).toHaveBeenCalledWith("adb -s dev1 shell dumpsys window");
  });

  it("only looks at focus lines", () => {
    const output = [
      "  Window #3 Window{9f u0 com.whatsapp/com.whatsapp.Main}:",
      "  mFocusedApp=ActivityRecord{77 u0 com.android.settings/.Settings t12}",
    ].join("\n");
    expect(androidMod.parseCurrentApp(output)).toBe("Settings");
  });

  it("reports System Home for an unknown package", () => {
    expect(
      androidMod.parseCurrentApp(
        "mCurrentFocus=Window{4 u0 com.google.android.apps.nexuslauncher/.NexusLauncherActivity}",
      ),
    ).toBe("System Home");
  });
});
