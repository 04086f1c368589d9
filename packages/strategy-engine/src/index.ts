export {
	evaluateInstant,
	evaluateRule,
	findFiringDay,
	readRuleValues,
} from "./ruleEvaluator";
export type { RuleValues } from "./ruleEvaluator";
export {
	evaluateSequentialEntry,
	locateSequentialTriggers,
} from "./sequential";
export {
	evaluateAllRules,
	evaluateEntry,
	evaluateExit,
	findExitTrigger,
} from "./composition";
export { buildTrigger, describeRuleAt, explainingDay } from "./describeRule";
export type { RuleTrigger, TriggerSide } from "./describeRule";
