import { parseEther } from "ethers";

import { ChainError, IndexOutOfRangeError } from "../chain/errors.js";
import { LocalChain } from "../chain/LocalChain.js";
import type { ChainSigner } from "../chain/types.js";
import {
  FundMe,
  InsufficientContributionError,
  NotOwnerError,
  TransferFailedError,
} from "../contracts/FundMe.js";
import { attachPriceFeed, deployFundMe } from "../scripts/deploy.js";
import { SEND_VALUE } from "../scripts/interactions.js";
import { expect } from "./helpers/chai.js";
import { getMockPriceFeed, RejectingOwner } from "./helpers/contracts.js";

// $5 at $2000 per ether
const MINIMUM_ETH = parseEther("0.0025");
const STARTING_BALANCE = parseEther("10000");

describe("FundMe", function () {
  let chain: LocalChain;
  let owner: ChainSigner;
  let alice: ChainSigner;
  let bob: ChainSigner;
  let fundMe: FundMe;

  beforeEach(async function () {
    chain = new LocalChain();
    [owner, alice, bob] = chain.getSigners();
    ({ fundMe } = await deployFundMe(chain, { deployer: owner }));
  });

  describe("deployment", function () {
    it("sets the minimum to five dollars", function () {
      expect(FundMe.MINIMUM_USD).to.equal(parseEther("5"));
    });

    it("makes the deployer the owner", function () {
      expect(fundMe.getOwner()).to.equal(owner.address);
    });

    it("reports the price feed version", async function () {
      expect(await fundMe.getVersion()).to.equal(4n);
    });

    it("starts without funders", function () {
      expect(fundMe.getFundersCount()).to.equal(0);
      expect(chain.getBalance(fundMe.address)).to.equal(0n);
    });
  });

  describe("fund", function () {
    it("fails without enough ETH and changes nothing", async function () {
      await expect(fundMe.connect(alice).fund()).to.be.rejectedWith(
        InsufficientContributionError,
        "FundMe__InsufficientContribution(0, 5000000000000000000)"
      );

      expect(fundMe.getFundersCount()).to.equal(0);
      expect(fundMe.getAddressToAmountFunded(alice.address)).to.equal(0n);
      expect(chain.getBalance(fundMe.address)).to.equal(0n);
      expect(chain.getBalance(alice.address)).to.equal(STARTING_BALANCE);
    });

    it("draws the line at exactly five dollars", async function () {
      await expect(fundMe.connect(alice).fund({ value: MINIMUM_ETH - 1n })).to.be.rejectedWith(
        InsufficientContributionError
      );

      await fundMe.connect(alice).fund({ value: MINIMUM_ETH });
      expect(fundMe.getAddressToAmountFunded(alice.address)).to.equal(MINIMUM_ETH);
    });

    it("updates the funded amount and the funders list", async function () {
      await fundMe.connect(alice).fund({ value: SEND_VALUE });

      expect(fundMe.getAddressToAmountFunded(alice.address)).to.equal(SEND_VALUE);
      expect(fundMe.getFunder(0)).to.equal(alice.address);
      expect(chain.getBalance(fundMe.address)).to.equal(SEND_VALUE);
      expect(chain.getBalance(alice.address)).to.equal(STARTING_BALANCE - SEND_VALUE);
    });

    it("accumulates repeat contributions and lists the funder each time", async function () {
      await fundMe.connect(alice).fund({ value: SEND_VALUE });
      await fundMe.connect(bob).fund({ value: SEND_VALUE });
      await fundMe.connect(alice).fund({ value: SEND_VALUE });

      expect(fundMe.getAddressToAmountFunded(alice.address)).to.equal(SEND_VALUE * 2n);
      expect(fundMe.getFundersCount()).to.equal(3);
      expect(fundMe.getFunder(2)).to.equal(alice.address);
    });

    it("is reached by a plain transfer and by unknown calldata", async function () {
      await chain.sendTransaction(alice, { to: fundMe.address, value: SEND_VALUE });
      await fundMe.connect(bob).fallback({ value: SEND_VALUE });

      expect(fundMe.getAddressToAmountFunded(alice.address)).to.equal(SEND_VALUE);
      expect(fundMe.getAddressToAmountFunded(bob.address)).to.equal(SEND_VALUE);
      await expect(chain.sendTransaction(alice, { to: fundMe.address, value: 1n })).to.be.rejectedWith(
        InsufficientContributionError
      );
    });

    it("follows the price feed", async function () {
      const priceFeed = getMockPriceFeed(chain, fundMe.getPriceFeed());
      await priceFeed.connect(owner).updateAnswer(1n * 10n ** 8n);

      await expect(fundMe.connect(alice).fund({ value: SEND_VALUE })).to.be.rejectedWith(
        InsufficientContributionError,
        "FundMe__InsufficientContribution(100000000000000000, 5000000000000000000)"
      );
    });

    it("records concurrent contributions one after another", async function () {
      const funders = chain.getSigners().slice(1, 6);

      await Promise.all(funders.map((funder) => fundMe.connect(funder).fund({ value: SEND_VALUE })));

      expect(fundMe.getFundersCount()).to.equal(5);
      expect(funders.map((_, i) => fundMe.getFunder(i))).to.deep.equal(funders.map((funder) => funder.address));
      expect(chain.getBalance(fundMe.address)).to.equal(SEND_VALUE * 5n);
    });
  });

  describe("outside a transaction", function () {
    beforeEach(async function () {
      await fundMe.connect(alice).fund({ value: SEND_VALUE });
    });

    it("refuses a direct fund call", async function () {
      await expect(fundMe.fund({ sender: bob.address, value: parseEther("5") })).to.be.rejectedWith(
        ChainError,
        "FundMe.fund is only available to contract code inside a transaction"
      );

      expect(fundMe.getAddressToAmountFunded(bob.address)).to.equal(0n);
      expect(fundMe.getFundersCount()).to.equal(1);
    });

    for (const variant of ["withdraw", "cheaperWithdraw"] as const) {
      it(`refuses a direct ${variant} call and leaves funders and balances untouched`, async function () {
        await expect(fundMe[variant]({ sender: owner.address, value: 0n })).to.be.rejectedWith(
          ChainError,
          `FundMe.${variant} is only available to contract code inside a transaction`
        );

        expect(fundMe.getFundersCount()).to.equal(1);
        expect(fundMe.getFunder(0)).to.equal(alice.address);
        expect(fundMe.getAddressToAmountFunded(alice.address)).to.equal(SEND_VALUE);
        expect(chain.getBalance(fundMe.address)).to.equal(SEND_VALUE);
        expect(chain.getBalance(owner.address)).to.equal(STARTING_BALANCE);
      });
    }
  });

  describe("getFunder", function () {
    it("fails past the end of the list", async function () {
      await fundMe.connect(alice).fund({ value: SEND_VALUE });

      expect(() => fundMe.getFunder(1)).to.throw(IndexOutOfRangeError, "panic code 0x32");
      expect(() => fundMe.getFunder(-1)).to.throw(IndexOutOfRangeError);
    });
  });

  for (const variant of ["withdraw", "cheaperWithdraw"] as const) {
    describe(variant, function () {
      beforeEach(async function () {
        await fundMe.connect(alice).fund({ value: SEND_VALUE });
      });

      it("can only be called by the owner", async function () {
        await expect(fundMe.connect(bob)[variant]()).to.be.rejectedWith(NotOwnerError, "FundMe__NotOwner()");

        expect(chain.getBalance(fundMe.address)).to.equal(SEND_VALUE);
        expect(fundMe.getAddressToAmountFunded(alice.address)).to.equal(SEND_VALUE);
      });

      it("sends a single funder's contribution to the owner", async function () {
        const ownerBefore = chain.getBalance(owner.address);

        await fundMe.connect(owner)[variant]();

        expect(chain.getBalance(fundMe.address)).to.equal(0n);
        expect(chain.getBalance(owner.address)).to.equal(ownerBefore + SEND_VALUE);
        expect(fundMe.getAddressToAmountFunded(alice.address)).to.equal(0n);
        expect(fundMe.getFundersCount()).to.equal(0);
        expect(() => fundMe.getFunder(0)).to.throw(IndexOutOfRangeError);
      });

      it("sweeps contributions from multiple funders", async function () {
        const funders = chain.getSigners().slice(2, 10);
        for (const funder of funders) {
          await fundMe.connect(funder).fund({ value: SEND_VALUE });
        }
        const ownerBefore = chain.getBalance(owner.address);
        const contractBefore = chain.getBalance(fundMe.address);
        expect(contractBefore).to.equal(SEND_VALUE * 9n);

        await fundMe.connect(owner)[variant]();

        expect(chain.getBalance(fundMe.address)).to.equal(0n);
        expect(chain.getBalance(owner.address)).to.equal(ownerBefore + contractBefore);
        for (const funder of [alice, ...funders]) {
          expect(fundMe.getAddressToAmountFunded(funder.address)).to.equal(0n);
        }
        expect(fundMe.getFundersCount()).to.equal(0);
      });

      it("succeeds again once the balance is empty", async function () {
        await fundMe.connect(owner)[variant]();
        await fundMe.connect(owner)[variant]();

        expect(chain.getBalance(fundMe.address)).to.equal(0n);
        expect(chain.getBalance(owner.address)).to.equal(STARTING_BALANCE + SEND_VALUE);
      });

      it("lets funding start over afterwards", async function () {
        await fundMe.connect(owner)[variant]();
        await fundMe.connect(bob).fund({ value: SEND_VALUE });

        expect(fundMe.getFunder(0)).to.equal(bob.address);
        expect(fundMe.getFundersCount()).to.equal(1);
      });
    });
  }

  describe("when the owner refuses ether", function () {
    let ownerContract: RejectingOwner;
    let rejectedFundMe: FundMe;

    beforeEach(async function () {
      const priceFeed = attachPriceFeed(chain, fundMe.getPriceFeed());
      ownerContract = await chain.deploy(alice, (context) => new RejectingOwner(context));
      await chain.sendTransaction(alice, {
        to: ownerContract.address,
        data: () => ownerContract.createFundMe(priceFeed),
      });
      if (ownerContract.fundMe === undefined) {
        throw new Error("FundMe was not created");
      }
      rejectedFundMe = ownerContract.fundMe;
      await rejectedFundMe.connect(bob).fund({ value: SEND_VALUE });
    });

    it("is owned by the contract that created it", function () {
      expect(rejectedFundMe.getOwner()).to.equal(ownerContract.address);
    });

    for (const variant of ["withdraw", "cheaperWithdraw"] as const) {
      for (const failure of ["revert", "overspend"] as const) {
        it(`fails ${variant} and keeps the bookkeeping when receive fails by ${failure}`, async function () {
          ownerContract.failure = failure;

          await expect(
            chain.sendTransaction(alice, { to: ownerContract.address, data: () => ownerContract.withdraw(variant) })
          ).to.be.rejectedWith(TransferFailedError, "FundMe__TransferFailed()");

          expect(chain.getBalance(rejectedFundMe.address)).to.equal(SEND_VALUE);
          expect(chain.getBalance(ownerContract.address)).to.equal(0n);
          expect(rejectedFundMe.getAddressToAmountFunded(bob.address)).to.equal(SEND_VALUE);
          expect(rejectedFundMe.getFundersCount()).to.equal(1);
          expect(rejectedFundMe.getFunder(0)).to.equal(bob.address);
        });
      }
    }
  });
});
