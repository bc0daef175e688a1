#!/usr/bin/env node
import * as dotenv from "dotenv";
import { main } from "./main";

dotenv.config();

main(process.env).then((code) => {
	process.exitCode = code;
});
