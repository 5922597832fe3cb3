import { setQuiet } from "./log.js";

setQuiet(true);
