/**
 * Sample programs bundled with the emulator
 */

// Quotient and remainder of 2003 / 82 by repeated subtraction.
// Ends with quotient 24 at 0x104 and remainder 35 at 0x103.
export const euclideanDivisionAsm = `; This program computes the quotient and remainder in the Euclidean division
; of two integer numbers. The division is implemented subtracting the divisor
; from the dividend until the difference becomes negative, and counting the
; number of iterations.

; Load initial values to memory
INI 0x100 0x7d3 ; dividend: 2003
INI 0x101 0x52  ; divisor:  82
INI 0x102 0x1   ; unit
INI 0x103 0x0   ; remainder
INI 0x104 0x0   ; quotient

; Actual program code
LOAD  0x100 ; load dividend
STORE 0x103 ; save it as temporary remainder
LOAD  0x103 ; load temporary remainder
SUB   0x101 ; subtract divisor from the temporary remainder
JGE   0x6   ; if result is >= 0, the algorithm has not finished yet
STOP
STORE 0x103 ; store new temporary remainder
LOAD  0x104 ; increment quotient
ADD   0x102
STORE 0x104
JUMP  0x2
`;

// 7 * 6 by repeated addition; product lands in 0x013
export const multiplyAsm = `; Multiply two positive numbers by repeated addition
INI 0x010 0x7   ; multiplicand
INI 0x011 0x6   ; multiplier, counts down
INI 0x012 0x1   ; unit
INI 0x013 0x0   ; product

LOAD  0x011     ; anything left to add?
JNE   0x3
STOP
LOAD  0x013     ; product += multiplicand
ADD   0x010
STORE 0x013
LOAD  0x011     ; multiplier -= 1
SUB   0x012
STORE 0x011
JUMP  0x0
`;

// 2047 + 1 wraps around to -2048
export const overflowAsm = `; Two's-complement wraparound of the accumulator
INI 0x020 0x7ff ; largest positive value
INI 0x021 0x1

LOAD  0x020
ADD   0x021
STORE 0x022     ; -2048
STOP
`;

// Jumps past the last instruction; halts with a program counter fault
export const runawayJumpAsm = `; Jump outside the program
INI 0x030 0x5

LOAD  0x030
JUMP  0x3       ; there are only three instructions
STOP
`;

export interface SampleProgram {
  name: string;
  source: string;
}

export const programs: SampleProgram[] = [
  { name: 'Euclidean division (2003 / 82)', source: euclideanDivisionAsm },
  { name: 'Multiply by repeated addition (7 * 6)', source: multiplyAsm },
  { name: 'Accumulator wraparound', source: overflowAsm },
  { name: 'Jump outside the program', source: runawayJumpAsm },
];
