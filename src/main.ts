// Demo wiring: a 60 LED strip split in two halves, driven in simulation or over MQTT
import { loadConfig } from './config';
import { Colors } from './core/Color';
import type { DeviceBackends } from './core/createDevice';
import { MqttClient } from './mqtt/MqttClient';
import { LedController, sequence } from './engine/LedController';
import { TickScheduler } from './engine/Scheduler';
import { AnimationPresets, withConfig } from './engine/vendor';
import { asFrameSink, createFrameStore } from './visualizer/frameStore';
import { renderAnsi } from './visualizer/ansi';

const DEMO_STEP_MS = 8000;

async function main(): Promise<void> {
  const config = loadConfig();
  const scheduler = new TickScheduler(config.tickMs);
  const backends: DeviceBackends = {};
  let mqtt: MqttClient | null = null;

  if (config.mode === 'real') {
    mqtt = new MqttClient();
    mqtt.onDeviceStatus((status) => console.log('[Device] Status', status));
    await mqtt.connect(config.brokerUrl, config.username, config.password, config.deviceId);
    backends.transport = mqtt;
  } else {
    const store = createFrameStore(config.pixelCount);
    store.subscribe((state, prev) => {
      if (state.statusLabel !== prev.statusLabel) console.log(`[Sim] ${state.statusLabel}`);
    });
    // Redraw the terminal strip at a human pace, not every tick
    setInterval(() => process.stdout.write(`\r${renderAnsi(store.getState().frame)}`), 100).unref();
    backends.visualizer = asFrameSink(store);
  }

  const leds = new LedController(config, backends, scheduler);
  const device = leds.createDevice();
  const fullStrip = leds.createStrip(0, config.pixelCount);
  const half = Math.floor(config.pixelCount / 2);
  const leftHalf = leds.createStrip(0, half);
  const rightHalf = leds.createStrip(half, config.pixelCount);

  leds.setStripColor(device, fullStrip, Colors.OFF)();

  const startedAt = Date.now();
  const breathe = leds.createAnimation(device, leftHalf, {
    kind: 'breathe',
    color: Colors.PURPLE,
    frequency: 0.5,
    dimmness: 0.1,
  });
  const gauge = leds.createAnimation(device, rightHalf, {
    kind: 'range',
    min: 0,
    max: 100,
    supplier: () => 50 + 50 * Math.sin((Date.now() - startedAt) / 1000),
    fillColor: Colors.CYAN,
    emptyColor: Colors.OFF,
  });
  const countdown = leds.createAnimation(device, fullStrip, {
    kind: 'countdown',
    time: DEMO_STEP_MS / 1000,
    color: Colors.ORANGE,
  });

  scheduler.onError = () => {
    scheduler.stop();
    process.exitCode = 1;
  };
  scheduler.start();

  breathe.run();
  gauge.run();

  const steps = [
    () => {
      breathe.end();
      gauge.end();
      countdown.run();
    },
    sequence(
      () => countdown.end(),
      leds.animateStrip(device, leftHalf, Colors.PURPLE, 'ColorFlow', withConfig(AnimationPresets.defaults(), { speed: 0.6 })),
      leds.animateStrip(
        device,
        rightHalf,
        Colors.ORANGE,
        'ColorFlow',
        withConfig(AnimationPresets.defaults(), { direction: 'BACKWARD', speed: 0.6 })
      )
    ),
    leds.animateStrip(device, fullStrip, Colors.ORANGE, 'Fire', AnimationPresets.calmFire()),
  ];
  let step = 0;
  const demoTimer = setInterval(() => {
    const next = steps[step++];
    if (next) next();
    else clearInterval(demoTimer);
  }, DEMO_STEP_MS);

  process.once('SIGINT', () => {
    clearInterval(demoTimer);
    breathe.end();
    gauge.end();
    countdown.end();
    scheduler.stop();
    mqtt?.disconnect();
    process.stdout.write('\n');
  });
}

main().catch((err) => {
  console.error('[Main] Startup failed:', err);
  process.exitCode = 1;
});
