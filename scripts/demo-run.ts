import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { loadSkillTreeFromCsv, parseTrainedLevelsCsv } from '@skillqueue/skill-data';
import {
  QueueResolver,
  TrainingPlanService,
  applyResolverConstantsCsv,
  createConsoleLogger,
  describeSteps,
} from '@skillqueue/core';

const readData = (name: string) =>
  readFileSync(fileURLToPath(new URL(`./data/${name}`, import.meta.url)), 'utf8');

(() => {
  const constants = applyResolverConstantsCsv(readData('constants.csv'));
  const logger = createConsoleLogger('demo');
  logger.info('Resolver constants loaded', { ...constants });

  const tree = loadSkillTreeFromCsv(readData('skills.csv'), readData('requirements.csv'));
  const trainedLevels = parseTrainedLevelsCsv(readData('trainedLevels.csv'));
  logger.info('Skill data loaded', { skills: tree.size, trained: trainedLevels.size });

  const resolver = new QueueResolver({ provider: tree, trainedLevels, logger });
  const jumpDrive = tree.findByName('Jump Drive Operation');
  if (jumpDrive === undefined) {
    throw new Error('Jump Drive Operation is missing from the demo data.');
  }

  const first = resolver.addSkillRequest(jumpDrive, 1);
  console.log('Add Jump Drive Operation I:');
  describeSteps(first.steps, resolver).forEach((step) =>
    console.log(`  ${step.skillName} ${step.level}`)
  );

  const repeat = resolver.addSkillRequest(jumpDrive, 1);
  console.log('\nAdd it again:', repeat.steps.length, 'new steps');

  const raise = resolver.addSkillRequest(jumpDrive, 3);
  console.log('\nRaise to III:');
  describeSteps(raise.steps, resolver).forEach((step) =>
    console.log(`  ${step.skillName} ${step.level}`)
  );

  const service = new TrainingPlanService(tree, { trainedLevels, logger });
  const snapshot = service.importPlanText(
    ['Evasive Maneuvering 4', 'Shield Operation 2', 'Cloaking 3', 'not a plan line'].join('\n')
  );
  console.log('\nImported plan:');
  snapshot.summary.forEach((entry) =>
    console.log(
      `  ${resolver.nameOf(entry.skillId)} ${entry.fromLevel}-${entry.toLevel} (${entry.stepCount} steps)`
    )
  );
  console.log('Unparsed lines:', snapshot.parseErrors);
  console.log('Unknown skills:', snapshot.notFoundSkills);

  console.log('\nDone');
})();
