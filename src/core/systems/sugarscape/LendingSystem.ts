/**
 * @module Core/Systems/SugarScape/LendingSystem
 * @layer Core
 * @description Кредиты между агентами.
 *
 * - Кредиторы: бесплодные агенты с запасом больше стартового или плодовитые
 *   с запасом больше двойного стартового.
 * - Заёмщики: плодовитые агенты с запасом меньше стартового.
 * - Заём гасится через `loanDuration` тиков после выдачи и стоит
 *   `amount * (1 + interest)` с округлением вниз. Заёмщик, который не может
 *   заплатить, отдаёт половину сахара, а остаток переоформляется новым займом.
 * - Между двумя агентами не больше одного займа.
 */

import { AgentId } from '../../simulation/AgentArena';
import { Loan, SugarAgent } from '../../../entities/SugarScape';
import { isFertile } from './landscape';
import { SugarWorld, updateAgent } from './world';

export const availableToLend = (agent: SugarAgent): number => {
  const reserve = isFertile(agent) ? 2 * agent.endowment : agent.endowment;
  return Math.max(agent.sugar - reserve, 0);
};

export const neededToBorrow = (agent: SugarAgent): number =>
  isFertile(agent) ? Math.max(agent.endowment - agent.sugar, 0) : 0;

const transfer = (world: SugarWorld, fromId: AgentId, toId: AgentId, amount: number): void => {
  if (amount <= 0) return;
  const from = world.agents.getNext(fromId);
  updateAgent(world, fromId, { sugar: from.sugar - amount });
  const to = world.agents.getNext(toId);
  updateAgent(world, toId, { sugar: to.sugar + amount });
};

const linked = (loans: readonly Loan[], a: AgentId, b: AgentId): boolean =>
  loans.some(loan =>
    (loan.lenderId === a && loan.borrowerId === b) || (loan.lenderId === b && loan.borrowerId === a)
  );

/** Гасит наступившие займы; возвращает оставшиеся открытыми. */
export const settleLoans = (world: SugarWorld, loans: readonly Loan[]): Loan[] => {
  const open: Loan[] = [];
  for (const loan of loans) {
    if (!world.agents.hasNext(loan.lenderId) || !world.agents.hasNext(loan.borrowerId)) continue;
    if (world.tick - loan.issuedAt < world.params.loanDuration) {
      open.push(loan);
      continue;
    }

    const due = Math.floor(loan.amount * (1 + loan.interest));
    const balance = world.agents.getNext(loan.borrowerId).sugar;
    if (balance >= due) {
      transfer(world, loan.borrowerId, loan.lenderId, due);
      continue;
    }

    const partial = Math.floor(Math.max(balance, 0) / 2);
    transfer(world, loan.borrowerId, loan.lenderId, partial);
    const remaining = due - partial;
    if (remaining > 0) {
      open.push({ ...loan, amount: remaining, issuedAt: world.tick });
    }
  }
  return open;
};

/** Выдаёт новые займы в дополнение к `open`; возвращает полный список. */
export const issueLoans = (world: SugarWorld, open: readonly Loan[]): Loan[] => {
  const loans = [...open];
  const ids = world.agents.nextIds();

  for (const lenderId of ids) {
    for (const borrowerId of ids) {
      if (borrowerId === lenderId || linked(loans, lenderId, borrowerId)) continue;
      const amount = Math.min(
        availableToLend(world.agents.getNext(lenderId)),
        neededToBorrow(world.agents.getNext(borrowerId))
      );
      if (amount <= 0) continue;

      transfer(world, lenderId, borrowerId, amount);
      loans.push({ lenderId, borrowerId, amount, issuedAt: world.tick, interest: world.params.loanInterest });
    }
  }
  return loans;
};

export const runLending = (world: SugarWorld): void => {
  const open = settleLoans(world, world.loans.staged());
  world.loans.setNext(issueLoans(world, open));
};
