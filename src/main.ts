/**
 * =============================================================================
 * MAIN.TS - Demo senza grafica
 * =============================================================================
 * Un copione di comandi su un timer accelerato: tre velivoli lanciati,
 * orbitano l'obiettivo mentre la portaerei si muove, poi appontano.
 */

import { Simulation } from './game/Simulation';
import { RecordingSceneHost } from './rendering/SceneHost';

interface ScriptStep {
    at: number;
    label: string;
    run: (simulation: Simulation) => void;
}

const STEP = 1 / 60;
/** Passi fissi per ogni scatto del timer: 10x il tempo reale */
const STEPS_PER_TIMER = 10;
const TIMER_MS = 1000 / 60;
const TIME_LIMIT = 240;

// Schermo 800x600, 20 px per unità, y verso il basso
const scene = new RecordingSceneHost({ scale: 20, originX: 400, originY: 300, flipY: true });

const simulation = new Simulation({
    scene,
    params: { aircraft: { liveTime: 20 } }
});

const script: ScriptStep[] = [
    { at: 0, label: 'obiettivo a (10, 15)', run: sim => sim.mouseClicked(600, 0, true) },
    { at: 0, label: 'lancio 1', run: sim => sim.mouseClicked(0, 0, false) },
    { at: 1.5, label: 'lancio 2', run: sim => sim.mouseClicked(0, 0, false) },
    { at: 3, label: 'avanti', run: sim => sim.keyPressed('ArrowUp') },
    { at: 4, label: 'lancio 3', run: sim => sim.mouseClicked(0, 0, false) },
    { at: 12, label: 'virata a sinistra', run: sim => sim.keyPressed('ArrowLeft') },
    { at: 18, label: 'fine virata', run: sim => sim.keyReleased('ArrowLeft') },
    { at: 30, label: 'stop', run: sim => sim.keyReleased('ArrowUp') }
];

let landed = 0;
let launched = 0;
simulation.events.on('aircraft:launched', () => launched++);
simulation.events.on('aircraft:landed', () => landed++);

function runScript(): void {
    while (script.length > 0 && script[0].at <= simulation.time) {
        const step = script[0];
        script.shift();
        console.log(`[Demo] t=${simulation.time.toFixed(2)}s ${step.label}`);
        step.run(simulation);
    }
}

/**
 * @returns true quando la demo è finita
 */
function advance(): boolean {
    for (let i = 0; i < STEPS_PER_TIMER; i++) {
        runScript();
        simulation.update(STEP);

        const allLanded = script.length === 0 && launched > 0 && landed === launched;
        if (allLanded || simulation.time >= TIME_LIMIT) {
            return true;
        }
    }
    return false;
}

function finish(timer: NodeJS.Timeout): void {
    clearInterval(timer);

    const ship = simulation.ship;
    console.log(
        `[Demo] Fine a t=${simulation.time.toFixed(2)}s: ${landed}/${launched} appontati, ` +
        `nave in (${ship.x.toFixed(2)}, ${ship.y.toFixed(2)}), ${ship.refillTimers.length} slot in ricarica, ` +
        `${scene.liveMeshes('aircraft').length} mesh velivolo vive`
    );

    simulation.dispose();
}

const timer = setInterval(() => {
    try {
        if (advance()) {
            finish(timer);
        }
    } catch (error) {
        console.error('[Demo] Simulazione interrotta da un errore:', error);
        clearInterval(timer);
        process.exitCode = 1;
    }
}, TIMER_MS);

process.once('SIGINT', () => {
    console.log('[Demo] Interrotta');
    if (!simulation.isDisposed) {
        finish(timer);
    }
});
