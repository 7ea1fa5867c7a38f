import { describe, it, expect } from "vitest";
import { describeEntityClass, type Entity } from "./entity.js";
import { stringIds } from "./id-index.js";
import { createRepository } from "./repository.js";
import { MemoryBlobStore } from "./stores/memory.js";
import { InvalidEntityTypeError } from "./errors.js";

class Sensor implements Entity<number> {
  static readonly tableName = "Sensor";
  static readonly primaryKeyName = "sensorId";

  constructor(
    readonly sensorId: number | undefined,
    readonly unit: string
  ) {}

  getPrimaryKey(): number | undefined {
    return this.sensorId;
  }

  serialize(): string {
    return `${this.sensorId ?? ""},${this.unit}`;
  }

  static deserialize(content: string): Sensor {
    const [id = "", unit = ""] = content.split(",");
    return new Sensor(Number(id), unit);
  }
}

class Room implements Entity<string> {
  static readonly tableName = "Room";
  static readonly primaryKeyName = "code";
  static readonly ids = stringIds;

  constructor(
    readonly code: string | undefined,
    readonly floor: number
  ) {}

  getPrimaryKey(): string | undefined {
    return this.code;
  }

  serialize(): string {
    return `${this.code ?? ""}@${this.floor}`;
  }

  static deserialize(content: string): Room {
    const [code = "", floor = "0"] = content.split("@");
    return new Room(code, Number(floor));
  }
}

describe("describeEntityClass()", () => {
  it("should adapt static and instance members", () => {
    const sensors = describeEntityClass(Sensor);
    const sensor = new Sensor(4, "celsius");

    expect(sensors.tableName).toBe("Sensor");
    expect(sensors.primaryKeyName).toBe("sensorId");
    expect(sensors.primaryKeyOf(sensor)).toBe(4);
    expect(sensors.serialize(sensor)).toBe("4,celsius");
    expect(sensors.deserialize("4,celsius")).toEqual(sensor);
    expect(sensors.ids.format(4)).toBe("4");
  });

  it("should use a codec declared on the class", async () => {
    const store = new MemoryBlobStore();
    const rooms = createRepository(store, describeEntityClass(Room));

    await rooms.save(new Room("B12", 2));

    expect(await store.read("Room_code_B12")).toBe("B12@2");
    expect(await rooms.findById("B12")).toEqual(new Room("B12", 2));
  });

  it("should persist class instances through a repository", async () => {
    const store = new MemoryBlobStore();
    const sensors = createRepository(store, describeEntityClass(Sensor));

    await sensors.saveAll([new Sensor(1, "celsius"), new Sensor(2, "lux")]);

    const all = await sensors.findAll();
    expect(all).toHaveLength(2);
    expect(all[1]).toBeInstanceOf(Sensor);
    expect(all.map((s) => s.unit)).toEqual(["celsius", "lux"]);
  });

  it("should reject a class without a key name", () => {
    const Broken = {
      tableName: "Broken",
      primaryKeyName: "",
      deserialize: (content: string) => new Sensor(Number(content), "none"),
    };

    expect(() => describeEntityClass(Broken)).toThrow(InvalidEntityTypeError);
  });
});
