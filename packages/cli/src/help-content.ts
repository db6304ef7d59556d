/**
 * PenDraw CLI Help Content
 * Dense, progressive-discovery language reference for terminal output.
 */

export const QUICKREF = `
PENDRAW QUICK REFERENCE (v0.4)
==============================

PROGRAM STRUCTURE
  var size = 40                          # declare a variable (let works too)
  size = size + 10                       # assign to a declared variable
  forward(size)                          # call a command or function
  return size                            # end the program with a value

VALUES
  number: 42  3.5  1e3   string: "red"   boolean: true/false
  null: a var declared without a value, or a call that returns nothing

TURTLE
  starts at (0, 0) facing up (heading 90), pen down
  forward/fd  backward/bk  left/lt  right/rt  setheading/seth  goto  home
  penup/pu  pendown/pd  color  width  fill  nofill  xcor  ycor  heading

SHAPES
  circle(r [, x, y])  rectangle(w, h [, x, y])  line(x1, y1, x2, y2)
  polygon(x1, y1, x2, y2, x3, y3, ...)  arc(w, h [, angle])  clear  reset

CONTROL FLOW
  if cond { ... } else if cond { ... } else { ... }
  while cond { ... }
  for i = 1 to 10 step 2 { ... }
  function name(a, b) { ... return a + b }

OPERATORS
  + - * / % ^   == != < <= > >=   and or not

EXIT CODES: 0=ok  2=lex/parse/check  4=runtime/io/config

HELP TOPICS
  pendraw help syntax
  pendraw help drawing
  pendraw help math
  pendraw help flow
  pendraw help functions
  pendraw help errors
  pendraw help examples
`.trimStart();

export const TOPICS: Record<string, string> = {

// ─── SYNTAX ─────────────────────────────────────────────────────────────────
syntax: `
PENDRAW SYNTAX REFERENCE
========================

COMMENTS
  # single-line comment (own line or end of line)

STATEMENTS
  var name = expr                        # declare in the current scope
  var name                               # declare as null
  let name = expr                        # same as var
  name = expr                            # assign the nearest declaration
  expr                                   # evaluate (usually a call)
  return expr                            # leave a function or the program
  { ... }                                # block with its own scope

SEPARATORS
  - One statement per line, or several separated by ;
  - End a line with \\ to continue the statement on the next line
  - A closing } ends the statement before it
  - "} else {" must stay on one line

EXPRESSIONS
  42  3.5  .5  1e-3  "text"  true  false # literals
  name                                   # variable
  name(arg, ...)                         # call
  (expr)                                 # grouping

PRECEDENCE (loosest first)
  or
  and
  not
  == != < <= > >=
  + -
  * / %
  ^                                      # right-associative: 2^3^2 = 512
  unary -                                # -2^2 = 4

STRINGS
  Double-quoted. Escapes: \\" \\\\ \\n \\t

RESERVED WORDS
  var let if else while for to step function return and or not true false
`.trimStart(),

// ─── DRAWING ────────────────────────────────────────────────────────────────
drawing: `
PENDRAW DRAWING COMMANDS
========================

COORDINATES
  Origin at the centre of the canvas, x to the right, y up.
  Headings in degrees: 0 = right, 90 = up, counter-clockwise positive.

MOVEMENT
  forward(d)        fd(d)     move along the heading (draws when pen is down)
  backward(d)       bk(d)     move against the heading
  left(deg)         lt(deg)   turn counter-clockwise
  right(deg)        rt(deg)   turn clockwise
  setheading(deg)   seth(deg) face an absolute heading
  goto(x, y)                  move to a point (draws when pen is down)
  home()                      goto(0, 0) and face up

PEN
  penup()    pu()             stop drawing while moving
  pendown()  pd()             draw while moving
  color("red")                stroke and fill color (any SVG color)
                              a string: "red", "#ff8800", "rgb(0,128,255)";
                              numbers are rejected with E_ARG_TYPE
  width(n)                    stroke width, n > 0
  fill() / nofill()           fill closed shapes with the pen color

SHAPES (the turtle does not move)
  circle(r [, x, y])          centred on the turtle or on (x, y)
  rectangle(w, h [, x, y])    rect(...); corner at the turtle or at (x, y)
  line(x1, y1, x2, y2)
  polygon(x1, y1, ..., xn, yn)  at least 3 points, even argument count
  arc(w, h [, angle])         upper half of a w x h ellipse at the turtle,
                              rotated by angle degrees

CANVAS
  clear()                     erase the drawing, keep the turtle
  reset()                     turtle home, pen down, color and width restored
  show() / hide()             accepted for compatibility

QUERIES
  xcor()  ycor()  heading()   current turtle state as numbers
`.trimStart(),

// ─── MATH ───────────────────────────────────────────────────────────────────
math: `
PENDRAW MATH FUNCTIONS
======================

TRIGONOMETRY (degrees)
  sin(x)  cos(x)  tan(x)
  asin(x)  acos(x)            x in [-1, 1], else E_MATH_DOMAIN
  atan(x)  atan2(y, x)

ARITHMETIC
  sqrt(x)                     x >= 0, else E_MATH_DOMAIN
  abs(x)  floor(x)  ceil(x)
  round(x)                    halves round to the even neighbour
  min(x, ...)  max(x, ...)    one or more numbers
  pow(base, exponent)

CONSTANTS AND RANDOMNESS
  pi()  e()  random()         random() is in [0, 1)

OPERATORS
  %                           result takes the sign of the divisor: -7 % 3 = 2
  / and % by zero             E_DIV_ZERO
`.trimStart(),

// ─── FLOW ───────────────────────────────────────────────────────────────────
flow: `
PENDRAW CONTROL FLOW
====================

CONDITIONS
  Booleans, or numbers (non-zero is true). Anything else is E_TYPE.
  and / or stop early: false and f() never calls f.

IF
  if x > 0 {
    forward(x)
  } else if x < 0 {
    backward(-x)
  } else {
    circle(5)
  }

WHILE
  var i = 0
  while i < 36 {
    forward(10)
    right(10)
    i = i + 1
  }

FOR
  for i = 1 to 4 { ... }                 # 1, 2, 3, 4
  for i = 10 to 1 step -3 { ... }        # 10, 7, 4, 1
  Bounds and step are evaluated once. Step 0 runs no iterations.
  The loop variable belongs to each iteration's scope.

LIMITS
  Loops run until done unless a time limit stops them:
  pendraw run --time-limit <ms>, or limits.timeMs in the config.
`.trimStart(),

// ─── FUNCTIONS ──────────────────────────────────────────────────────────────
functions: `
PENDRAW FUNCTIONS
=================

DEFINE
  function square(size) {
    for i = 1 to 4 {
      forward(size)
      right(90)
    }
  }

CALL
  square(50)
  Calls need exactly as many arguments as parameters.
  Built-in names win over functions of the same name.

RETURN
  function hyp(a, b) {
    return sqrt(a * a + b * b)
  }
  A function without return gives null.

SCOPE
  Parameters and variables declared inside are local.
  The body sees globals, never the caller's locals.
  Recursion works up to limits.maxCallDepth (default 200, at most 500).
`.trimStart(),

// ─── ERRORS ─────────────────────────────────────────────────────────────────
errors: `
PENDRAW DIAGNOSTICS REFERENCE
=============================

LEX (exit 2)
  E_INVALID_CHAR          character that starts no token
  E_UNTERMINATED_STRING   string without closing quote
  E_MALFORMED_NUMBER      number glued to letters or extra dots

PARSE (exit 2)
  E_UNEXPECTED_TOKEN      token the grammar does not allow here
  E_MISSING_TOKEN         expected ) } or a separator
  E_INVALID_EXPR          expression expected

CHECK (exit 2)
  E_DUP_PARAM             parameter name repeated; run stops on it too
  E_CALL_ARITY            wrong argument count for a known function
  E_UNKNOWN_FN            name that is neither built-in nor defined
  pendraw check reports all three. pendraw run only reports the last two
  when the call is reached, as E_ARG_COUNT and E_UNDEFINED_FN.

RUNTIME (exit 4)
  E_UNDEFINED_VAR         variable used or assigned before var
  E_UNDEFINED_FN          call to an unknown function
  E_TYPE                  operator or condition on the wrong type
  E_DIV_ZERO              / or % by zero
  E_ARG_COUNT             wrong number of arguments
  E_ARG_TYPE              argument of the wrong type or range
  E_MATH_DOMAIN           sqrt of a negative, asin/acos outside [-1, 1]
  E_CALL_DEPTH            recursion deeper than maxCallDepth
  E_TIMEOUT               time limit reached
  E_CANCELLED             run cancelled by the host

HOST (exit 4)
  E_IO                    file could not be read or written
  E_CONFIG                invalid configuration file
  E_HOST                  unexpected failure outside the language

OUTPUT
  JSON by default; --pretty prints "error[CODE]: message", location,
  call stack and hint.
`.trimStart(),

// ─── EXAMPLES ───────────────────────────────────────────────────────────────
examples: `
PENDRAW EXAMPLES
================

1. SQUARE
  for i = 1 to 4 {
    forward(100)
    right(90)
  }

2. SPIRAL
  var len = 5
  while len < 200 {
    forward(len)
    right(91)
    len = len + 3
  }

3. FILLED SHAPES
  color("tomato")
  fill()
  circle(40)
  color("steelblue")
  rectangle(80, 40, -100, -100)

4. STAR
  function star(size) {
    for i = 1 to 5 {
      forward(size)
      right(144)
    }
  }
  star(150)

5. FLOWER
  function petal(r) {
    for i = 1 to 2 {
      for j = 1 to 60 {
        forward(r)
        right(1.5)
      }
      right(90)
    }
  }
  for k = 1 to 12 {
    petal(2)
    right(30)
  }

CLI USAGE
  pendraw run art.pen --out art.svg      # write SVG
  pendraw run art.pen --format json      # list drawing calls
  pendraw run art.pen --trace t.jsonl    # emit execution trace
  pendraw check art.pen                  # validate without running
  pendraw fmt art.pen --write            # format in place
  pendraw repl --out session.svg         # interactive session
  pendraw trace t.jsonl                  # summarize a trace
  pendraw config                         # show effective configuration
`.trimStart(),

};

export const TOPIC_LIST = Object.keys(TOPICS);

export const REPL_HELP = `
REPL COMMANDS
  help        show this text
  vars        list global variables
  functions   list defined functions
  clear       erase the drawing
  reset       forget variables and functions, turtle home
  exit, quit  leave the session

End a line with \\ to continue it on the next line.
Run 'pendraw help <topic>' for the language reference.
`.trim();
