import { TrafficSimulation } from '../simulation/TrafficSimulation.js';

const simulation = new TrafficSimulation({ numLanes: 3, length: 50, carsPerLane: 10, seed: 7 });
const start = Date.now();

for (let i = 0; i < 5; i++) {
  const timestamp = start + (i + 1) * 100;
  const snapshot = simulation.step(timestamp);
  const metrics = simulation.metrics();
  console.log(
    `tick=${snapshot.tick} lanes=[${snapshot.laneCounts.join(',')}] meanV=${metrics.meanVelocity.toFixed(2)} changes=${simulation.getLastSummary()?.laneChanges ?? 0}`
  );
}
