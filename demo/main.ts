import {
  browserHost,
  createPresenter,
  noiseField,
  setDebugLogging,
  stopOnUnload,
} from 'pixel-pacer';

const WIDTH = 320;
const HEIGHT = 200;

const fpsInput = document.querySelector<HTMLInputElement>('#opt-fps');
const fpsValue = document.querySelector<HTMLSpanElement>('#val-fps');
const cellInput = document.querySelector<HTMLSelectElement>('#opt-cell');
const toggleButton = document.querySelector<HTMLButtonElement>('#toggle');
const statsDisplay = document.querySelector<HTMLSpanElement>('#stats');

setDebugLogging(new URLSearchParams(location.search).has('debug'));

const presenter = createPresenter(WIDTH, HEIGHT, browserHost(window));
stopOnUnload(presenter, window);

function currentFps(): number {
  return fpsInput ? parseFloat(fpsInput.value) : 30;
}

function currentStep() {
  const cellSize = cellInput ? parseInt(cellInput.value, 10) : 16;
  return noiseField({
    cellSize,
    frequency: 0.02,
    speed: 0.02,
    from: { r: 16, g: 24, b: 64 },
    to: { r: 255, g: 196, b: 92 },
  });
}

function start(): void {
  presenter.start(currentFps(), currentStep());
  if (toggleButton) toggleButton.textContent = 'Stop';
}

function stop(): void {
  presenter.stop();
  if (toggleButton) toggleButton.textContent = 'Start';
}

// FPS changes apply on the next refresh; no restart needed.
fpsInput?.addEventListener('input', () => {
  if (fpsValue) fpsValue.textContent = fpsInput.value;
  presenter.setFPS(currentFps());
});

// A new cell size needs a new render step, so restart the loop.
cellInput?.addEventListener('change', () => {
  if (!presenter.running) return;
  stop();
  start();
});

toggleButton?.addEventListener('click', () => {
  if (presenter.running) stop();
  else start();
});

// Stats readout, refreshed a few times per second
setInterval(() => {
  if (!statsDisplay) return;
  const { fps, presented, skipped, unchanged } = presenter.stats();
  statsDisplay.textContent =
    `${fps.toFixed(1)} fps · ${presented} presented · ` +
    `${skipped} skipped · ${unchanged} unchanged`;
}, 250);

start();
