/*
 * Writes a minimal NetCDF classic (CDF-1) file: fixed-size dimensions, no
 * attributes, every variable stored as big-endian doubles.
 */

export type FixtureDimension = { name: string; size: number };
export type FixtureVariable = { name: string; dimensions: string[]; data: number[] };

const NC_DIMENSION = 0x0a;
const NC_VARIABLE = 0x0b;
const NC_DOUBLE = 6;

class ByteWriter {
  readonly bytes: number[] = [];

  int32(value: number) {
    this.bytes.push((value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff);
  }

  name(value: string) {
    const encoded = Buffer.from(value, "utf8");
    this.int32(encoded.length);
    this.bytes.push(...encoded);
    while (this.bytes.length % 4 !== 0) this.bytes.push(0);
  }

  double(value: number) {
    const view = new DataView(new ArrayBuffer(8));
    view.setFloat64(0, value, false);
    for (let idx = 0; idx < 8; idx++) this.bytes.push(view.getUint8(idx));
  }
}

function writeHeader(dimensions: FixtureDimension[], variables: FixtureVariable[], begins: number[]): ByteWriter {
  const writer = new ByteWriter();
  writer.bytes.push(0x43, 0x44, 0x46, 0x01);
  writer.int32(0);

  writer.int32(NC_DIMENSION);
  writer.int32(dimensions.length);
  for (const dimension of dimensions) {
    writer.name(dimension.name);
    writer.int32(dimension.size);
  }

  writer.int32(0);
  writer.int32(0);

  writer.int32(NC_VARIABLE);
  writer.int32(variables.length);
  variables.forEach((variable, idx) => {
    writer.name(variable.name);
    writer.int32(variable.dimensions.length);
    for (const dimensionName of variable.dimensions) {
      writer.int32(dimensions.findIndex((dimension) => dimension.name === dimensionName));
    }
    writer.int32(0);
    writer.int32(0);
    writer.int32(NC_DOUBLE);
    writer.int32(variable.data.length * 8);
    writer.int32(begins[idx]);
  });
  return writer;
}

export function buildNetcdf(dimensions: FixtureDimension[], variables: FixtureVariable[]): Uint8Array {
  const headerLength = writeHeader(dimensions, variables, variables.map(() => 0)).bytes.length;
  const begins: number[] = [];
  let offset = headerLength;
  for (const variable of variables) {
    begins.push(offset);
    offset += variable.data.length * 8;
  }

  const writer = writeHeader(dimensions, variables, begins);
  for (const variable of variables) {
    for (const value of variable.data) writer.double(value);
  }
  return Uint8Array.from(writer.bytes);
}
