import {
  annotated,
  arrayOf,
  assertConforms,
  CompilationCache,
  ConfigManager,
  conforms,
  Integer,
  literal,
  mapOf,
  nullable,
  optional,
  ref,
  Scope,
  shapeOf,
  unionOf,
  ViolationError,
} from "../src";

const config = new ConfigManager(process.cwd());
config.loadEnvironment();
const cache = new CompilationCache(config.toCacheOptions());

const generateEvenNumbers = () => {
  const out: number[] = [];
  for (let i = 0; i < 100; i++) {
    out.push(Math.floor(Math.random() * 100) * 2);
  }
  return out;
};

const Even = annotated(Integer, "x % 2 === 0");
const evens = generateEvenNumbers();

console.log("Evens (sampled)", conforms(evens, arrayOf(Even), { cache }));
console.log("Evens (exhaustive)", conforms([...evens, 3], arrayOf(Even), { cache, strategy: "exhaustive" }));

const Sandwich = shapeOf({
  bread: unionOf(String, arrayOf(String)),
  meat: String,
  cheese: optional(String),
});

const hotdog = {
  bread: "hotdog bun",
  meat: "hotdog",
  condiments: ["mustard", "relish", "ketchup"],
};

console.log("Does a hotdog fit a classic sandwich?", conforms(hotdog, Sandwich, { cache }));

const menu = new Scope({ Sandwich, Menu: mapOf(String, "Sandwich[]") });
const weekly = new Map([["monday", [{ bread: "rye", meat: "cold cuts", cheese: 4 }]]]);

try {
  assertConforms(weekly, ref("Menu"), { cache, scope: menu, strategy: "exhaustive" });
} catch (error) {
  if (!(error instanceof ViolationError)) throw error;
  console.log(error.message);
}

const Tree = shapeOf({ label: literal("leaf", "branch"), parent: nullable("Tree") });
const scope = { Tree };
const leaf = { label: "leaf", parent: { label: "branch", parent: null } };

console.log("Tree", conforms(leaf, ref("Tree"), { cache, scope }));
cache.logStats();
