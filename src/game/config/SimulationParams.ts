/**
 * =============================================================================
 * SIMULATION-PARAMS.TS - Parametri della portaerei e dei velivoli
 * =============================================================================
 */

export interface ShipParams {
    linearSpeed: number;
    angularSpeed: number;
    /** Distanza dalla nave entro cui un velivolo si considera appontato */
    size: number;
    /** Secondi prima che uno slot liberato torni disponibile */
    refillTime: number;
    capacity: number;
}

export interface AircraftParams {
    /** Raggio dell'orbita attorno all'obiettivo */
    targetRadius: number;
    acceleration: number;
    /** Velocità lineare massima (V_MAX) */
    linearSpeed: number;
    angularSpeed: number;
    takeoffTime: number;
    liveTime: number;
    landingSpeed: number;
}

export interface SimulationParams {
    ship: Readonly<ShipParams>;
    aircraft: Readonly<AircraftParams>;
    /** Derivato una volta sola, vedi calculateLandingRadius() */
    landingRadius: number;
}

export interface SimulationParamsOverrides {
    ship?: Partial<ShipParams>;
    aircraft?: Partial<AircraftParams>;
}

export const SHIP_PARAMS: Readonly<ShipParams> = {
    linearSpeed: 0.5,
    angularSpeed: 0.5,
    size: 0.2,
    refillTime: 10,
    capacity: 5
};

export const AIRCRAFT_PARAMS: Readonly<AircraftParams> = {
    targetRadius: 1.5,
    acceleration: 0.3,
    linearSpeed: 2.5,
    angularSpeed: 2.5,
    takeoffTime: 3,
    liveTime: 50,
    landingSpeed: 2.5 / 1.5
};

/**
 * Distanza oltre la quale il velivolo non rischia di superare il bersaglio.
 *
 * Caso peggiore: il velivolo punta nella direzione opposta e deve prima
 * girare di 180° mantenendo la velocità massima, poi rallentare fino alla
 * velocità di atterraggio (decelerazione lineare, integrale triangolare).
 */
export function calculateLandingRadius(aircraft: Readonly<AircraftParams>): number {
    const rotationTime = Math.PI / aircraft.angularSpeed;
    const rotationTravel = rotationTime * aircraft.linearSpeed;

    const slowdownTime = (aircraft.linearSpeed - aircraft.landingSpeed) / aircraft.acceleration;
    const slowdownTravel = (aircraft.linearSpeed - aircraft.landingSpeed) * slowdownTime / 2;

    return rotationTravel + slowdownTravel;
}

function assertPositive(group: string, values: object): void {
    for (const [key, value] of Object.entries(values)) {
        if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
            throw new Error(`Parametro ${group}.${key} non valido: atteso numero > 0, ricevuto ${String(value)}`);
        }
    }
}

export function validateParams(ship: ShipParams, aircraft: AircraftParams): void {
    assertPositive('ship', ship);
    assertPositive('aircraft', aircraft);

    if (!Number.isInteger(ship.capacity)) {
        throw new Error(`Parametro ship.capacity non valido: atteso intero, ricevuto ${ship.capacity}`);
    }
    if (aircraft.landingSpeed >= aircraft.linearSpeed) {
        throw new Error(
            `aircraft.landingSpeed (${aircraft.landingSpeed}) deve essere minore di aircraft.linearSpeed (${aircraft.linearSpeed})`
        );
    }
    if (aircraft.takeoffTime > aircraft.liveTime) {
        throw new Error(
            `aircraft.takeoffTime (${aircraft.takeoffTime}) non può superare aircraft.liveTime (${aircraft.liveTime})`
        );
    }
}

export function createSimulationParams(overrides: SimulationParamsOverrides = {}): SimulationParams {
    const ship: ShipParams = { ...SHIP_PARAMS, ...overrides.ship };
    const aircraft: AircraftParams = { ...AIRCRAFT_PARAMS, ...overrides.aircraft };

    validateParams(ship, aircraft);

    return {
        ship: Object.freeze(ship),
        aircraft: Object.freeze(aircraft),
        landingRadius: calculateLandingRadius(aircraft)
    };
}

export default createSimulationParams;
