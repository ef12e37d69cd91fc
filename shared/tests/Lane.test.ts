import { describe, expect, it } from 'vitest';
import { Car } from '../engine/Car.ts';
import { EmptyLaneError, OccupiedCellError } from '../engine/errors.ts';
import { Lane } from '../engine/Lane.ts';
import { createSeededRandom, createSequenceRandom } from '../engine/random.ts';

const steady = () => createSequenceRandom([0.9]);

describe('Lane', () => {
  it('keeps cars sorted by position', () => {
    const lane = new Lane(20, [new Car(0, 9, 1), new Car(1, 2, 1)]);
    expect(lane.positions()).toEqual([2, 9]);
  });

  it('rejects two cars on one cell', () => {
    expect(() => new Lane(20, [new Car(0, 4, 1), new Car(1, 4, 2)])).toThrow(OccupiedCellError);
  });

  it('populates distinct cells with velocities in the initial range', () => {
    let id = 0;
    const lane = Lane.populate(50, 10, createSeededRandom(5), () => id++);
    const positions = lane.positions();

    expect(lane.size).toBe(10);
    expect(new Set(positions).size).toBe(10);
    expect(positions).toEqual([...positions].sort((a, b) => a - b));
    lane.velocities().forEach(velocity => {
      expect(velocity).toBeGreaterThanOrEqual(1);
      expect(velocity).toBeLessThanOrEqual(5);
    });
    expect(lane.getCars().map(car => car.id).sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  describe('tick', () => {
    it('is a no-op on an empty lane', () => {
      const lane = new Lane(20);
      lane.tick(steady());
      expect(lane.size).toBe(0);
    });

    it('computes every gap from the pre-tick positions', () => {
      // The front car moves away, but the car behind still sees it at cell 1
      const lane = new Lane(20, [new Car(0, 0, 3), new Car(1, 1, 3)]);
      lane.tick(steady());

      expect(lane.positions()).toEqual([0, 5]);
      expect(lane.velocities()).toEqual([0, 4]);
    });

    it('restores position order after a car wraps past cell 0', () => {
      const lane = new Lane(20, [new Car(0, 5, 0), new Car(1, 18, 4)]);
      lane.tick(steady());

      expect(lane.positions()).toEqual([3, 6]);
      expect(lane.getCars().map(car => car.id)).toEqual([1, 0]);
    });
  });

  describe('tickWithLaneChange', () => {
    it('hands departing cars back and advances the rest', () => {
      const lane = new Lane(30, [new Car(0, 10, 2), new Car(1, 12, 0)]);
      const departures = lane.tickWithLaneChange([{ position: 20, velocity: 0 }], null, steady());

      expect(departures).toHaveLength(1);
      expect(departures[0].direction).toBe('left');
      expect(departures[0].car.id).toBe(0);
      expect(departures[0].car.position).toBe(10);
      expect(departures[0].car.velocity).toBe(2);
      expect(lane.positions()).toEqual([13]);
    });

    it('returns departures in lane order', () => {
      const lane = new Lane(30, [new Car(0, 0, 0), new Car(1, 2, 0), new Car(2, 4, 0)]);
      const departures = lane.tickWithLaneChange(null, [{ position: 15, velocity: 0 }], steady());

      expect(departures.map(({ car, direction }) => [car.id, direction])).toEqual([
        [0, 'right'],
        [1, 'right'],
      ]);
      expect(lane.positions()).toEqual([5]);
    });

    it('returns nothing for an empty lane', () => {
      expect(new Lane(30).tickWithLaneChange([], [], steady())).toEqual([]);
    });
  });

  describe('addCar', () => {
    it('inserts at the car\'s rank', () => {
      const lane = new Lane(20, [new Car(0, 2, 1), new Car(1, 12, 1)]);
      lane.addCar(new Car(2, 7, 0));

      expect(lane.positions()).toEqual([2, 7, 12]);
      expect(lane.isOccupied(7)).toBe(true);
      expect(lane.isOccupied(8)).toBe(false);
    });

    it('refuses an occupied cell', () => {
      const lane = new Lane(20, [new Car(0, 2, 1)]);
      expect(() => lane.addCar(new Car(1, 2, 0))).toThrow(OccupiedCellError);
    });
  });

  describe('injectCrash', () => {
    it('crashes the uniformly chosen car', () => {
      const lane = new Lane(20, [new Car(0, 1, 1), new Car(1, 5, 1), new Car(2, 9, 1)]);
      const crashed = lane.injectCrash(createSequenceRandom([0.5]), 30);

      expect(crashed.id).toBe(1);
      expect(crashed.crashTimer).toBe(30);
    });

    it('fails on an empty lane', () => {
      expect(() => new Lane(20).injectCrash(steady(), 30)).toThrow(EmptyLaneError);
    });
  });
});
