import { rgb, type Color } from "./color.js";

/**
 * Built-in colors from the Tango palette, each with a light and dark version.
 */

export const lightRed = (): Color => rgb(239, 41, 41);
export const red = (): Color => rgb(204, 0, 0);
export const darkRed = (): Color => rgb(164, 0, 0);

export const lightOrange = (): Color => rgb(252, 175, 62);
export const orange = (): Color => rgb(245, 121, 0);
export const darkOrange = (): Color => rgb(206, 92, 0);

export const lightYellow = (): Color => rgb(255, 233, 79);
export const yellow = (): Color => rgb(237, 212, 0);
export const darkYellow = (): Color => rgb(196, 160, 0);

export const lightGreen = (): Color => rgb(138, 226, 52);
export const green = (): Color => rgb(115, 210, 22);
export const darkGreen = (): Color => rgb(78, 154, 6);

export const lightBlue = (): Color => rgb(114, 159, 207);
export const blue = (): Color => rgb(52, 101, 164);
export const darkBlue = (): Color => rgb(32, 74, 135);

export const lightPurple = (): Color => rgb(173, 127, 168);
export const purple = (): Color => rgb(117, 80, 123);
export const darkPurple = (): Color => rgb(92, 53, 102);

export const lightBrown = (): Color => rgb(233, 185, 110);
export const brown = (): Color => rgb(193, 125, 17);
export const darkBrown = (): Color => rgb(143, 89, 2);

export const black = (): Color => rgb(0, 0, 0);
export const white = (): Color => rgb(255, 255, 255);

export const lightGray = (): Color => rgb(238, 238, 236);
export const gray = (): Color => rgb(211, 215, 207);
export const darkGray = (): Color => rgb(186, 189, 182);

export const lightGrey = lightGray;
export const grey = gray;
export const darkGrey = darkGray;

export const lightCharcoal = (): Color => rgb(136, 138, 133);
export const charcoal = (): Color => rgb(85, 87, 83);
export const darkCharcoal = (): Color => rgb(46, 52, 54);
