import { z } from "zod";

export function num(what: string) {
  return z.number({ invalid_type_error: `${what} must be a number` });
}

export function positive(what: string) {
  return num(what).positive(`${what} must be positive`);
}

export const noArgsSchema = z.tuple([]);

export const distanceSchema = z.tuple([num("distance")]);

export const angleSchema = z.tuple([num("angle")]);

export const pointSchema = z.tuple([num("x"), num("y")]);

export const circleSchema = z.tuple([num("radius")]).rest(num("center coordinate"));

export const rectangleSchema = z.tuple([num("width"), num("height")]).rest(num("corner coordinate"));

export const lineSchema = z.tuple([num("x1"), num("y1"), num("x2"), num("y2")]);

export const polygonSchema = z.array(num("coordinate"));

export const arcSchema = z.tuple([num("width"), num("height")]).rest(num("angle"));

export const colorSchema = z.tuple([
  z.string({ invalid_type_error: "color must be a string" }).min(1, "color must not be empty"),
]);

export const penWidthSchema = z.tuple([positive("width")]);

export const unarySchema = z.tuple([num("x")]);

export const atan2Schema = z.tuple([num("y"), num("x")]);

export const powSchema = z.tuple([num("base"), num("exponent")]);

export const numbersSchema = z.array(num("x"));
