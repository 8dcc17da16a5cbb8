/**
 * Device control tests against a scripted command runner
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  AndroidEmulatorDriver,
  DeviceError,
  DeviceTimeoutError,
  IosSimulatorDriver,
  LOG_TRUNCATION_MARKER,
  MAX_DEVICE_LOG_SIZE,
  findFreeEmulatorPort,
  findSimulatorState,
  truncateLog,
  type BackgroundProcess,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
} from '../../src/services/device-management/index.js';

type Script = (commandLine: string) => Partial<CommandResult> | undefined;

/**
 * Records command lines and answers them from a script
 */
class ScriptedCommandRunner implements CommandRunner {
  readonly commands: string[] = [];
  readonly spawned: string[] = [];
  readonly killed: Array<NodeJS.Signals | undefined> = [];

  constructor(private script: Script = () => undefined) {}

  async run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    options.signal?.throwIfAborted();
    const commandLine = [command, ...args].join(' ');
    this.commands.push(commandLine);
    return { exitCode: 0, stdout: '', stderr: '', ...this.script(commandLine) };
  }

  spawnBackground(command: string, args: readonly string[]): BackgroundProcess {
    this.spawned.push([command, ...args].join(' '));
    return {
      pid: 4242,
      kill: (signal?: NodeJS.Signals) => {
        this.killed.push(signal);
        return true;
      },
    };
  }
}

const SIMCTL_LIST = JSON.stringify({
  devices: {
    'com.apple.CoreSimulator.SimRuntime.iOS-17-5': [
      { udid: 'SIM-0001', name: 'iPhone 15', state: 'Booted' },
      { udid: 'SIM-0002', name: 'iPhone 15 Pro', state: 'Shutdown' },
    ],
  },
});

const ADB_DEVICES = 'List of devices attached\nemulator-5554\tdevice\nemulator-5556\toffline\n';

describe('truncateLog', () => {
  it('should keep short logs unchanged', () => {
    assert.strictEqual(truncateLog('abc', 3, '[cut]'), 'abc');
  });

  it('should keep the tail of long logs behind a marker', () => {
    assert.strictEqual(truncateLog('abcdef', 3, '[cut]'), '[cut]def');
  });
});

describe('findSimulatorState', () => {
  it('should match by udid or name', () => {
    assert.strictEqual(findSimulatorState(SIMCTL_LIST, 'SIM-0001'), 'Booted');
    assert.strictEqual(findSimulatorState(SIMCTL_LIST, 'iPhone 15 Pro'), 'Shutdown');
  });

  it('should return undefined for unknown devices and unreadable output', () => {
    assert.strictEqual(findSimulatorState(SIMCTL_LIST, 'iPad'), undefined);
    assert.strictEqual(findSimulatorState('not json', 'SIM-0001'), undefined);
    assert.strictEqual(findSimulatorState('{"runtimes": []}', 'SIM-0001'), undefined);
  });
});

describe('findFreeEmulatorPort', () => {
  it('should skip ports that adb already lists', () => {
    assert.strictEqual(findFreeEmulatorPort(ADB_DEVICES, { start: 5554, end: 5600 }), 5558);
  });

  it('should round an odd start up to the next even port', () => {
    assert.strictEqual(findFreeEmulatorPort('', { start: 5555, end: 5600 }), 5556);
  });

  it('should skip reserved ports', () => {
    assert.strictEqual(findFreeEmulatorPort('', { start: 5554, end: 5600 }, new Set([5554])), 5556);
  });

  it('should treat the range end as exclusive', () => {
    assert.strictEqual(findFreeEmulatorPort('emulator-5554\tdevice', { start: 5554, end: 5556 }), undefined);
  });
});

describe('IosSimulatorDriver', () => {
  let workDir: string;

  before(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'ios-driver-'));
  });

  after(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('should boot and wait for the booted state', async () => {
    const runner = new ScriptedCommandRunner((line) =>
      line.endsWith('list devices -j') ? { stdout: SIMCTL_LIST } : undefined
    );

    await new IosSimulatorDriver(runner).boot('SIM-0001');

    assert.deepStrictEqual(runner.commands, ['xcrun simctl boot SIM-0001', 'xcrun simctl list devices -j']);
  });

  it('should accept a simulator that is already booted', async () => {
    const runner = new ScriptedCommandRunner((line) => {
      if (line.includes(' boot ')) {
        return { exitCode: 149, stderr: 'Unable to boot device in current state: Booted' };
      }
      return line.endsWith('list devices -j') ? { stdout: SIMCTL_LIST } : undefined;
    });

    await new IosSimulatorDriver(runner).boot('SIM-0001');
  });

  it('should fail when simctl cannot boot the device', async () => {
    const runner = new ScriptedCommandRunner(() => ({ exitCode: 1, stderr: 'Invalid device: SIM-9999' }));

    await assert.rejects(new IosSimulatorDriver(runner).boot('SIM-9999'), {
      name: 'DeviceError',
      code: 'BOOT_FAILED',
      message: 'Failed to boot simulator SIM-9999: Invalid device: SIM-9999',
    });
  });

  it('should write both language and locale defaults', async () => {
    const runner = new ScriptedCommandRunner();

    await new IosSimulatorDriver(runner).setLocale('SIM-0001', 'de_DE');

    assert.deepStrictEqual(runner.commands, [
      'xcrun simctl spawn SIM-0001 defaults write -g AppleLanguages -array de_DE',
      'xcrun simctl spawn SIM-0001 defaults write -g AppleLocale de_DE',
    ]);
  });

  it('should pass only the configured status bar overrides', async () => {
    const runner = new ScriptedCommandRunner();

    await new IosSimulatorDriver(runner).setStatusBar('SIM-0001', {
      time: '9:41',
      wifiBars: 3,
      cellularBars: undefined,
      batteryState: 'charged',
    });

    assert.deepStrictEqual(runner.commands, [
      'xcrun simctl status_bar SIM-0001 override --time 9:41 --wifiBars 3 --batteryState charged',
    ]);
  });

  it('should tolerate a failed shutdown', async () => {
    const runner = new ScriptedCommandRunner(() => ({ exitCode: 149, stderr: 'current state: Shutdown' }));
    await new IosSimulatorDriver(runner).shutdown('SIM-0001');
    assert.deepStrictEqual(runner.commands, ['xcrun simctl shutdown SIM-0001']);
  });

  it('should verify the screenshot file exists', async () => {
    const existing = join(workDir, 'home_en-US.png');
    await writeFile(existing, 'png');
    const driver = new IosSimulatorDriver(new ScriptedCommandRunner());

    await driver.screenshot('SIM-0001', existing);
    await assert.rejects(driver.screenshot('SIM-0001', join(workDir, 'missing.png')), {
      code: 'SCREENSHOT_FAILED',
      message: `Screenshot was not created at expected path: ${join(workDir, 'missing.png')}`,
    });
  });

  it('should truncate long device logs', async () => {
    const runner = new ScriptedCommandRunner(() => ({ stdout: 'x'.repeat(MAX_DEVICE_LOG_SIZE + 10) }));

    const logs = await new IosSimulatorDriver(runner).captureLogs('SIM-0001');

    assert.strictEqual(logs, LOG_TRUNCATION_MARKER + 'x'.repeat(MAX_DEVICE_LOG_SIZE));
  });

  it('should describe a failed log capture instead of throwing', async () => {
    const runner = new ScriptedCommandRunner(() => ({ exitCode: 1, stderr: 'log: permission denied' }));

    const logs = await new IosSimulatorDriver(runner).captureLogs('SIM-0001');

    assert.strictEqual(logs, 'Failed to capture iOS logs: log: permission denied');
  });
});

describe('AndroidEmulatorDriver', () => {
  const fastBoot = { androidHome: '/opt/android-sdk', startupGraceMs: 0, bootPollMs: 5, bootTimeoutMs: 50 };

  function bootingRunner(bootCompleted: string): ScriptedCommandRunner {
    return new ScriptedCommandRunner((line) => {
      if (line === 'adb devices') return { stdout: ADB_DEVICES };
      if (line.endsWith('getprop sys.boot_completed')) return { stdout: `${bootCompleted}\n` };
      return undefined;
    });
  }

  it('should start an emulator on the first free port and wait for boot', async () => {
    const runner = bootingRunner('1');

    const serial = await new AndroidEmulatorDriver(runner, fastBoot).boot('Pixel_7_API_34', { start: 5554, end: 5600 });

    assert.strictEqual(serial, 'emulator-5558');
    assert.deepStrictEqual(runner.spawned, [
      `${join('/opt/android-sdk', 'emulator', 'emulator')} -avd Pixel_7_API_34 -port 5558 -no-window -no-audio -no-snapshot-save`,
    ]);
  });

  it('should not hand out a port it already started an emulator on', async () => {
    const driver = new AndroidEmulatorDriver(bootingRunner('1'), fastBoot);
    const range = { start: 5554, end: 5600 };

    const first = await driver.boot('Pixel_7_API_34', range);
    const second = await driver.boot('Pixel_7_API_34', range);

    assert.deepStrictEqual([first, second], ['emulator-5558', 'emulator-5560']);
  });

  it('should release the port after shutdown', async () => {
    const runner = bootingRunner('1');
    const driver = new AndroidEmulatorDriver(runner, fastBoot);
    const range = { start: 5554, end: 5600 };

    const serial = await driver.boot('Pixel_7_API_34', range);
    await driver.shutdown(serial);

    assert.strictEqual(await driver.boot('Pixel_7_API_34', range), 'emulator-5558');
    assert.ok(runner.commands.includes('adb -s emulator-5558 emu kill'));
  });

  it('should kill the emulator when boot times out', async () => {
    const runner = bootingRunner('0');
    const driver = new AndroidEmulatorDriver(runner, { ...fastBoot, bootTimeoutMs: 20 });

    await assert.rejects(driver.boot('Pixel_7_API_34', { start: 5554, end: 5600 }), DeviceTimeoutError);
    assert.deepStrictEqual(runner.killed, ['SIGKILL']);
  });

  it('should report the serial once the emulator is spawned, before boot completes', async () => {
    const runner = bootingRunner('0');
    const driver = new AndroidEmulatorDriver(runner, { ...fastBoot, bootTimeoutMs: 20 });
    const started: string[] = [];

    await assert.rejects(
      driver.boot('Pixel_7_API_34', { start: 5554, end: 5600 }, undefined, (serial) => started.push(serial)),
      DeviceTimeoutError
    );

    assert.deepStrictEqual(started, ['emulator-5558']);
  });

  it('should require ANDROID_HOME', async () => {
    const driver = new AndroidEmulatorDriver(bootingRunner('1'), { startupGraceMs: 0 });

    await assert.rejects(driver.boot('Pixel_7_API_34', { start: 5554, end: 5600 }), {
      code: 'ANDROID_HOME_MISSING',
    });
  });

  it('should reject an inverted port range', async () => {
    const driver = new AndroidEmulatorDriver(bootingRunner('1'), fastBoot);

    await assert.rejects(
      driver.boot('Pixel_7_API_34', { start: 5600, end: 5554 }),
      (error: unknown) => error instanceof DeviceError && error.code === 'INVALID_PORT_RANGE'
    );
  });

  it('should fail when every port in the range is taken', async () => {
    const driver = new AndroidEmulatorDriver(bootingRunner('1'), fastBoot);

    await assert.rejects(driver.boot('Pixel_7_API_34', { start: 5554, end: 5558 }), {
      code: 'NO_EMULATOR_PORT',
      message: 'No available emulator ports found in range 5554-5558',
    });
  });

  it('should set the locale and broadcast the change', async () => {
    const runner = new ScriptedCommandRunner();

    await new AndroidEmulatorDriver(runner).setLocale('emulator-5554', 'de-DE');

    assert.deepStrictEqual(runner.commands, [
      'adb -s emulator-5554 shell setprop persist.sys.locale de-DE',
      'adb -s emulator-5554 shell am broadcast -a android.intent.action.LOCALE_CHANGED',
    ]);
  });

  it('should enter demo mode with the configured clock', async () => {
    const runner = new ScriptedCommandRunner();

    await new AndroidEmulatorDriver(runner).setStatusBar('emulator-5554', {
      demoMode: true,
      clock: '0941',
      battery: undefined,
      wifi: undefined,
      notifications: undefined,
    });

    assert.deepStrictEqual(runner.commands, [
      'adb -s emulator-5554 shell settings put global sysui_demo_allowed 1',
      'adb -s emulator-5554 shell am broadcast -a com.android.systemui.demo -e command enter',
      'adb -s emulator-5554 shell am broadcast -a com.android.systemui.demo -e command clock -e hhmm 0941',
    ]);
  });

  it('should leave the status bar alone when demo mode is off', async () => {
    const runner = new ScriptedCommandRunner();

    await new AndroidEmulatorDriver(runner).setStatusBar('emulator-5554', {
      demoMode: false,
      clock: '0941',
      battery: undefined,
      wifi: undefined,
      notifications: undefined,
    });

    assert.deepStrictEqual(runner.commands, []);
  });

  it('should report install failures with the adb output', async () => {
    const runner = new ScriptedCommandRunner(() => ({ exitCode: 1, stderr: 'INSTALL_FAILED_INSUFFICIENT_STORAGE' }));

    await assert.rejects(new AndroidEmulatorDriver(runner).installApp('emulator-5554', '/apps/app.apk'), {
      code: 'INSTALL_FAILED',
      message: 'Failed to install app /apps/app.apk: INSTALL_FAILED_INSUFFICIENT_STORAGE',
    });
  });

  it('should clear app data with pm clear', async () => {
    const runner = new ScriptedCommandRunner();

    await new AndroidEmulatorDriver(runner).resetAppData('emulator-5554', 'com.example.app');

    assert.deepStrictEqual(runner.commands, ['adb -s emulator-5554 shell pm clear com.example.app']);
  });
});
