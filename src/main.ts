/**
 * Shuttle Ring Entry Point
 * Resolves configuration, audio and display, then hands control to the stimulus loop
 */

import { resolveConfig, parseConfigOverrides } from '@/lib/config';
import { createDisplaySurface, defaultSurfaceCandidates } from '@/lib/displaySurface';
import { getAudioManager, destroyAudioManager, createCueSink } from '@/lib/audioManager';
import { InputSampler } from '@/lib/inputSampler';
import { createStimulus } from '@/lib/stimulusEngine';
import { StimulusLoop } from '@/lib/stimulusLoop';
import { Viewport, toCssColor } from '@/lib/viewport';
import { ConfigError } from '@/lib/errors';
import type { CueSink, DisplaySurface, StimulusConfig } from '@/types';

import '@/assets/styles/main.css';

let loop: StimulusLoop | null = null;

async function bootstrap(): Promise<void> {
  const appContainer = document.getElementById('app');
  if (!appContainer) {
    showError('Application container not found');
    return;
  }

  let config: StimulusConfig;
  try {
    config = resolveConfig(parseConfigOverrides(new URLSearchParams(window.location.search)));
  } catch (error) {
    console.error('Configuration rejected:', error);
    showError(error instanceof ConfigError ? error.issues.join('\n') : String(error));
    return;
  }

  document.body.style.background = toCssColor(config.window.background);

  const stimulus = createStimulus(config);
  const viewport = new Viewport(config.window.width, config.window.height);
  const input = new InputSampler(viewport);
  const cues = initAudio(config);

  let surface: DisplaySurface;
  try {
    surface = await createDisplaySurface(defaultSurfaceCandidates(appContainer, config, viewport, input));
  } catch (error) {
    // No display, no stimulus
    console.error('Display initialization failed:', error);
    showError(`Failed to start: ${error instanceof Error ? error.message : String(error)}`);
    await destroyAudioManager();
    return;
  }

  loop = new StimulusLoop({
    stimulus,
    surface,
    input,
    cues,
    onTerminated: () => {
      surface.destroy();
      loop = null;
      destroyAudioManager()
        .catch(error => console.error('[Audio] Shutdown failed:', error))
        .finally(showEnded);
    }
  });
  loop.start();
}

function initAudio(config: StimulusConfig): CueSink {
  const audio = getAudioManager();
  try {
    audio.init(config.cue);
  } catch (error) {
    console.warn('[Audio] Unavailable, running silently:', error);
    return createCueSink(null);
  }

  const resume = (): void => audio.resumeIfSuspended();
  document.addEventListener('pointerdown', resume, { once: true });
  document.addEventListener('keydown', resume, { once: true });
  return createCueSink(audio);
}

function showEnded(): void {
  const el = document.getElementById('ended-screen');
  if (el) el.style.display = 'flex';
}

function showError(message: string): void {
  const el = document.getElementById('error-screen');
  if (el) {
    el.style.display = 'flex';
    const msgEl = el.querySelector('.error-message');
    if (msgEl) msgEl.textContent = message;
  }
}

// Global error handlers
window.addEventListener('error', (e) => {
  console.error('Uncaught error:', e.error);
});

window.addEventListener('unhandledrejection', (e) => {
  console.error('Unhandled rejection:', e.reason);
});

window.addEventListener('beforeunload', () => {
  loop?.stop();
});

// Start
bootstrap().catch(error => {
  console.error('Bootstrap failed:', error);
  showError(`Failed to start application: ${error}`);
});
